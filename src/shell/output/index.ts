// CHANGE: Central export for console output
// PURITY: SHELL (re-exports only)

export { reportOutcome, reportValues } from "./report.js";
