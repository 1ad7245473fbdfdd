/**
 * Centralized Prompt Configuration
 *
 * - extraction.ts: main message classification
 * - contextResolver.ts: course / parallel / deadline-type pre-pass
 * - matching.ts: update → existing assignment resolution
 */

export * from "./extraction";
export * from "./contextResolver";
export * from "./matching";
