import { ConfigError } from "../errors/ShipperErrors";

const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Immutable identity of a stream. Two sets with the same pairs are equal
 * whatever order the pairs were supplied in.
 */
export class LabelSet {
  private readonly _labels: Readonly<Record<string, string>>;
  private readonly _key: string;

  private constructor(entries: Array<[string, string]>) {
    const sorted = [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const labels: Record<string, string> = {};
    for (const [name, value] of sorted) {
      labels[name] = value;
    }
    this._labels = Object.freeze(labels);
    this._key = JSON.stringify(sorted);
  }

  public static create(labels: Record<string, string> | Iterable<[string, string]>): LabelSet {
    const entries = LabelSet.toEntries(labels);
    const problems = LabelSet.validate(entries);
    if (problems.length > 0) {
      throw new ConfigError(problems);
    }
    return new LabelSet(entries);
  }

  public static validate(entries: Array<[string, string]>): string[] {
    const problems: string[] = [];
    if (entries.length === 0) {
      problems.push("at least one label must be specified");
    }
    for (const [name, value] of entries) {
      if (!LABEL_NAME_PATTERN.test(name)) {
        problems.push(`invalid label name "${name}"`);
      }
      if (typeof value !== "string") {
        problems.push(`label "${name}" must have a string value`);
      }
    }
    return problems;
  }

  /**
   * Returns a new set where the given pairs replace same-named labels.
   */
  public merge(overrides: Record<string, string>): LabelSet {
    const names = Object.keys(overrides);
    if (names.length === 0) {
      return this;
    }
    return LabelSet.create({ ...this._labels, ...overrides });
  }

  public get key(): string {
    return this._key;
  }

  public get size(): number {
    return Object.keys(this._labels).length;
  }

  public get(name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this._labels, name) ? this._labels[name] : undefined;
  }

  public equals(other: LabelSet): boolean {
    return this._key === other._key;
  }

  public toJSON(): Record<string, string> {
    return { ...this._labels };
  }

  public toString(): string {
    const pairs = Object.entries(this._labels).map(([name, value]) => `${name}=${JSON.stringify(value)}`);
    return `{${pairs.join(", ")}}`;
  }

  private static toEntries(
    labels: Record<string, string> | Iterable<[string, string]>
  ): Array<[string, string]> {
    if (LabelSet.isIterable(labels)) {
      return Array.from(labels);
    }
    return Object.entries(labels);
  }

  private static isIterable(
    value: Record<string, string> | Iterable<[string, string]>
  ): value is Iterable<[string, string]> {
    return Symbol.iterator in value;
  }
}
