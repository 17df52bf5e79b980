export { effectFn } from "./testing/utils.ts"
export * as TestLogger from "./testing/TestLogger.ts"
