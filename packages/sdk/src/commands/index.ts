export * from "./command.js";
export * from "./read-command.js";
export * from "./read-wallet-command.js";
export * from "./attest-card-key-command.js";
export * from "./attest-wallet-key-command.js";
export * from "./write-issuer-data-command.js";
