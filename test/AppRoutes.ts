import * as Param from "../src/Param.ts"
import * as Route from "../src/Route.ts"
import * as RouteMatcher from "../src/RouteMatcher.ts"
import * as RouteQuery from "../src/RouteQuery.ts"

export const Detail = Route.make({
  pattern: "/items/:item?:format",
  query: {
    page: RouteQuery.withDefault(Param.integer, 1),
  },
})

export const Listing = Route.make({
  pattern: "/list",
})

export const CategoryRoutes = RouteMatcher.make({
  Detail,
  Listing,
})

export const Category = Route.make({
  pattern: "/categories/:category",
  sub: CategoryRoutes,
})

export const AdminUser = Route.make({
  pattern: "/users/:id",
  params: {
    id: Param.integer,
  },
})

export const AdminRoutes = RouteMatcher.make({
  AdminUser,
  Category,
})

export const User = Route.make({
  pattern: "/users/:id",
  params: {
    id: Param.integer,
  },
  query: {
    tab: RouteQuery.withDefault(Param.choice(["profile", "activity"]), "profile"),
  },
})

export const Admin = Route.make({
  pattern: "/admin",
  query: {
    debug: RouteQuery.optional(Param.boolean),
  },
  sub: AdminRoutes,
})

export const Files = Route.make({
  pattern: "/files/*path",
})

export const AppRoutes = RouteMatcher.make({
  User,
  Admin,
  Files,
})
