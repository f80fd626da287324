export { type ConsoleTransportOptions, ConsoleTransport } from "./console.js";
export { type FileTransportOptions, FileTransport, formatLine } from "./file.js";
export { formatFields } from "./format.js";
export { type JsonTransportOptions, JsonTransport } from "./json.js";
