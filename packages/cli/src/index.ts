export * from "./format.js";
export { run as runDecode, type DecodeCommandArgs } from "./commands/decode.js";
export { runList as runTrustList, runClear as runTrustClear, type TrustCommandArgs } from "./commands/trust.js";
export { runShow as runConfigShow, runSet as runConfigSet, type ConfigCommandArgs } from "./commands/config.js";
export { run as runDemo, acceptingPrompt, type DemoCommandArgs } from "./commands/demo.js";
