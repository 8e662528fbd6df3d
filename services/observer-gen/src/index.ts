export { deriveBaseTag, findDuplicateTags, resolveConflicts, FALLBACK_TAG } from './shortNames.js';
export { assignTeamTags, loadRoster, parseRoster } from './roster.js';
export { makeUniqueColor, pickAccentColor, readLogoColor, toHexColor } from './color.js';
export { addSlotNumber, buildSlotSvg } from './slotBadge.js';
export type { SlotBadgeOptions } from './slotBadge.js';
export { manifestToCsv, saveManifest, MANIFEST_HEADERS } from './manifest.js';
export { findLogo, prepareTeamData, sharpImageTools } from './prepare.js';
export type { ImageTools, PrepareOptions } from './prepare.js';
export { createZip, zipDirectory } from './utils/zip.js';
export { getConfig, loadConfig } from './config.js';
export type { ObserverConfig } from './config.js';
export { runGenerate } from './cli/generate.js';
export type * from './types.js';
