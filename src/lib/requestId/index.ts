export { generateRequestId, runWithRequestId, getRequestId } from "./requestId";
