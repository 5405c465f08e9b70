export { REQUEST_ID_HEADER, withRequestId, getRequestIdFromRequest } from "./withRequestId";
