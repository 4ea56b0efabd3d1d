export { createAuthRoutes } from "./auth.js";
export { createTableRoutes, sendTableError } from "./tables.js";
