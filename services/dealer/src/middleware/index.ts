export { requireCaller, type CallerRequest } from "./auth.js";
