/**
 * Card SDK: sessions, commands and attestation on top of the shared
 * protocol layer.
 */

export * from "./card/card.js";
export * from "./card/firmware-version.js";
export * from "./attestation/attestation.js";
export * from "./attestation/attestation-task.js";
export * from "./attestation/online-card-verifier.js";
export * from "./attestation/online-result-slot.js";
export * from "./attestation/prompt.js";
export * from "./attestation/trusted-cards-repository.js";
export * from "./commands/index.js";
export * from "./session/card-session.js";
export * from "./session/environment.js";
export * from "./session/transport.js";
export * from "./lib/config-manager.js";
export * from "./lib/secure-storage.js";
export * from "./lib/file-secure-storage.js";
export * from "./lib/mock-card.js";
export * from "./card-sdk.js";
