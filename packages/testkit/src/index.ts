export { createTempRoot, removeDir, withTempDir, withFileBackend } from "./fs.js";
export { sleep, fixedClock, steppingClock } from "./timers.js";
export { FaultInjectingBackend } from "./faults.js";
export type { BackendCall, BackendMethod, FaultOptions } from "./faults.js";
export { UserSchema, makeUser, makeUsers, getUserId } from "./fixtures.js";
export type { User } from "./fixtures.js";
export { runCli, parseJsonOutput } from "./cli.js";
export type { CliResult, BufferedIo, CliExecOptions, CliMain } from "./cli.js";
