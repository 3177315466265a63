export { becknErrorHandler } from "./error-handler.js";
