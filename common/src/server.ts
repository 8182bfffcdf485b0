/**
 * Server-only exports from onboarding-common.
 * These modules use Node.js-specific APIs (like node:crypto) and should not be
 * imported in browser code.
 *
 * Usage: import { ... } from "onboarding-common/server"
 */
export * from "./util/TokenCipher";
