export { log, formatLogLine, type LogLevel } from "./log";
