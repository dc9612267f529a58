export { ErrorCode, isConfigurationCode } from "./codes.js";
