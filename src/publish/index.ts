// src/publish/index.ts

export type { AtomicWriteOptions } from "./atomic_write";
export { atomicWriteFile, atomicWriteJson, publishFile, removeIfPresent, tempPathFor } from "./atomic_write";
export type { AcquireLockParams, LockHandle } from "./lock";
export { UNREADABLE_GRACE_MS, acquireJobLock, lockPathFor } from "./lock";
export type { SidecarEntry, SidecarVerification } from "./sidecar";
export {
    formatSidecar,
    parseSidecar,
    readSidecar,
    sidecarPathFor,
    verifySidecar,
    writeSidecar,
} from "./sidecar";
export { stableStringify } from "./stable_stringify";
