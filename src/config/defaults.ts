export const DEFAULT_CONFIG_FILES = ["defkit.config.json", ".defkitrc.json"];

export const OUTPUT_FORMATS = ["text", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export const DEFAULT_OUTPUT_FORMAT: OutputFormat = "text";

export const DEFAULT_EXCLUDES = ["**/node_modules/**", "**/.git/**"];

// Build-root prefixes stripped from file names before defects are matched.
export const DEFAULT_BUILD_ROOT_PATTERNS = [
  "^/builddir/build/BUILD/[^/]+/",
  "^/var/tmp/[^/]+/[^/]+/",
  "^/tmp/[^/]+/"
];

export const LINK_SECTION_UNMATCHED = "Defects Available Only via Integrity Manager";
export const LINK_SECTION_OFFSETS = "Defects Missing in Integrity Manager";
