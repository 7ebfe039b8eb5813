/**
 * Keys of one section mapped to their values, in insertion order.
 */
export type Section = Map<string, string>;

/**
 * Key/value pairs given either as a Map or as a plain object.
 */
export type KeyValues = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

/**
 * Parsed INI content: sections in insertion order plus every line the parser
 * rejected. Pairs that precede any header live in the `""` section.
 */
export interface IniDocument {
  sections: Map<string, Section>;
  errors: string[];
}

export function createDocument(): IniDocument {
  return { sections: new Map(), errors: [] };
}

/**
 * Returns the named section, creating it when missing.
 */
export function ensureSection(document: IniDocument, name: string): Section {
  let section = document.sections.get(name);
  if (!section) {
    section = new Map();
    document.sections.set(name, section);
  }
  return section;
}

function isMap(values: KeyValues): values is ReadonlyMap<string, string> {
  return values instanceof Map;
}

export function entriesOf(values: KeyValues): [string, string][] {
  return isMap(values) ? [...values.entries()] : Object.entries(values);
}

/**
 * Copy each default pair into every existing section that lacks the key.
 * Existing values are never overwritten and no section is created.
 */
export function applyDefaults(document: IniDocument, defaults: KeyValues): void {
  const pairs = entriesOf(defaults);
  for (const section of document.sections.values()) {
    for (const [key, value] of pairs) {
      if (!section.has(key)) {
        section.set(key, value);
      }
    }
  }
}

export function clearDocument(document: IniDocument): void {
  document.sections.clear();
  document.errors.length = 0;
}

/**
 * Plain-object view of the sections, e.g. for JSON output.
 */
export function toRecord(document: IniDocument): Record<string, Record<string, string>> {
  const result: Record<string, Record<string, string>> = {};
  for (const [name, section] of document.sections) {
    result[name] = Object.fromEntries(section);
  }
  return result;
}
