// Structural characters
export const SECTION_START = "[";
export const SECTION_END = "]";
export const ASSIGN = "=";
export const COMMENT = ";";

// Interpolation placeholder: ${name} or ${section:name}
export const INTERPOLATION_START = "${";
export const INTERPOLATION_SEPARATOR = ":";
export const INTERPOLATION_END = "}";

/** Upper bound on global substitution passes performed by one interpolate() call */
export const MAX_INTERPOLATION_DEPTH = 10;
