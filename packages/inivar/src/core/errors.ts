/**
 * Thrown by {@link Ini.require} when a section or key does not exist.
 */
export class IniLookupError extends Error {
  public readonly section: string;
  public readonly key: string;

  constructor(section: string, key: string, missingSection: boolean) {
    super(
      missingSection
        ? `Section "${section}" not found`
        : `Key "${key}" not found in section "${section}"`,
    );
    this.name = "IniLookupError";
    this.section = section;
    this.key = key;
  }
}
