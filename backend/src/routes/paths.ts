// src/routes/paths.ts
// Route table. Routers register these paths; the auth gate resolves its
// exemptions from the same entries.

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface RouteId {
  readonly method: HttpMethod;
  readonly path: string;
}

export const ROUTES = {
  health:     { method: "GET",    path: "/health" },

  login:      { method: "POST",   path: "/api/v1/auth/login" },
  logout:     { method: "POST",   path: "/api/v1/auth/logout" },
  me:         { method: "GET",    path: "/api/v1/auth/me" },

  listUsers:  { method: "GET",    path: "/api/v1/user" },
  getUser:    { method: "GET",    path: "/api/v1/user/:id" },
  createUser: { method: "POST",   path: "/api/v1/user" },
  updateUser: { method: "PUT",    path: "/api/v1/user/:id" },
  deleteUser: { method: "DELETE", path: "/api/v1/user/:id" }
} as const satisfies Record<string, RouteId>;

/** Reachable without a valid session. */
export const PUBLIC_ROUTES: readonly RouteId[] = [ROUTES.health, ROUTES.login];
