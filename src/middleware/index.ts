export { requestLogger, responseLogger } from "./logger";
export { errorHandler, sendValidationError } from "./error-handler";
export {
  SESSION_COOKIE,
  loadVisitor,
  saveVisitorSession,
  setSessionCookie,
  clearSessionCookie,
} from "./session";
