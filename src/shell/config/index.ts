// CHANGE: Central export for configuration loading
// PURITY: SHELL (re-exports only)

export { loadManifest } from "./manifest.js";
