/**
 * Static-analysis cost metering
 *
 * Analysis runs on untrusted source, so checks that scale with the size
 * of a type signature charge their cost against a per-run budget.
 */

export * from "./functions.js";
export * from "./tracker.js";
