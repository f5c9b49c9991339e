export { ShellServiceTag, ShellServiceLive, ShellError } from "./ShellService";
export type { ShellService, ShellResult } from "./ShellService";
