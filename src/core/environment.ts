export type VariableSource = "default" | "global" | "local" | "passed" | "script";

export const SOURCE_PRIORITY: Record<VariableSource, number> = {
  default: 1,
  global: 2,
  local: 3,
  passed: 4,
  script: 5,
};

// Entry separator of a dump: newlines for env files, NUL for `env -0` output
export type DumpSeparator = "\n" | "\0";

export type EnvVariable = Readonly<{
  value: string;
  source: VariableSource;
}>;

/**
 * Variable table where every entry remembers which layer set it.
 *
 * Writes go through {@link Environment.upsert}, which only lets a source replace
 * an entry of equal or lower priority, so the ambient environment, the task
 * document, the command line and script-exported values compose in a fixed
 * order no matter when each layer is applied.
 */
export class Environment {
  private readonly variables = new Map<string, EnvVariable>();

  static fromRecord(
    record: Readonly<Record<string, string | undefined>>,
    source: VariableSource
  ): Environment {
    const env = new Environment();
    for (const [key, value] of Object.entries(record)) {
      if (value !== undefined) {
        env.upsert(key, value, source);
      }
    }
    return env;
  }

  static parse(
    dump: string,
    source: VariableSource,
    separator: DumpSeparator = "\n"
  ): Environment {
    const env = new Environment();
    env.load(dump, source, separator);
    return env;
  }

  get size(): number {
    return this.variables.size;
  }

  /**
   * @returns true when the write took effect
   */
  upsert(key: string, value: string, source: VariableSource): boolean {
    const existing = this.variables.get(key);
    if (existing) {
      const current = SOURCE_PRIORITY[existing.source];
      const incoming = SOURCE_PRIORITY[source];
      if (incoming < current) {
        return false;
      }
      if (incoming === current && existing.value === value) {
        return false;
      }
    }

    this.variables.set(key, { source, value });
    return true;
  }

  merge(other: Environment): void {
    for (const [key, variable] of other.entries()) {
      this.upsert(key, variable.value, variable.source);
    }
  }

  /**
   * Loads `KEY=VALUE` entries. Entries without `=` or with an empty key are
   * skipped. With a NUL separator, values may span several lines.
   */
  load(dump: string, source: VariableSource, separator: DumpSeparator = "\n"): void {
    for (const raw of dump.split(separator)) {
      const line = separator === "\n" && raw.endsWith("\r") ? raw.slice(0, -1) : raw;
      const equals = line.indexOf("=");
      if (equals <= 0) {
        continue;
      }
      this.upsert(line.slice(0, equals), line.slice(equals + 1), source);
    }
  }

  get(key: string): string | undefined {
    return this.variables.get(key)?.value;
  }

  lookup(key: string): EnvVariable | undefined {
    return this.variables.get(key);
  }

  has(key: string): boolean {
    return this.variables.has(key);
  }

  entries(): Array<[string, EnvVariable]> {
    return Array.from(this.variables);
  }

  clone(): Environment {
    const copy = new Environment();
    for (const [key, variable] of this.variables) {
      copy.variables.set(key, variable);
    }
    return copy;
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, variable] of this.variables) {
      record[key] = variable.value;
    }
    return record;
  }

  serialize(): string {
    return Array.from(this.variables, ([key, { value }]) => `${key}=${value}`).join("\n");
  }

  equals(other: Environment): boolean {
    if (other.size !== this.size) {
      return false;
    }
    for (const [key, variable] of this.variables) {
      const theirs = other.lookup(key);
      if (!theirs || theirs.value !== variable.value || theirs.source !== variable.source) {
        return false;
      }
    }
    return true;
  }
}
