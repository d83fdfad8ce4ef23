import { MappingConfigError } from './errors.js';

export type MappingPair = readonly [source: string, destination: string];

/**
 * Operator-supplied rename/remove rules (`--map-project`, `--map-tag`).
 *
 * Matching is exact on the whole value. A match with an empty destination
 * means "unset".
 */
export class MappingTable {
  private readonly rules: Map<string, string>;

  private constructor(rules: Map<string, string>) {
    this.rules = rules;
  }

  static empty(): MappingTable {
    return new MappingTable(new Map());
  }

  static fromPairs(pairs: Iterable<MappingPair>): MappingTable {
    const rules = new Map<string, string>();
    for (const [src, dst] of pairs) {
      if (rules.has(src)) throw new MappingConfigError(`Duplicate mapping for '${src}'`);
      rules.set(src, dst);
    }
    return new MappingTable(rules);
  }

  /** Parse repeated `SRC=DST` arguments. `SRC=` removes. */
  static parse(args: readonly string[]): MappingTable {
    return MappingTable.fromPairs(args.map(parseMappingArg));
  }

  get size() {
    return this.rules.size;
  }

  /** Returns the mapped value, the input when unmatched, or `undefined` when mapped to empty. */
  apply(value: string): string | undefined {
    const dst = this.rules.get(value);
    if (dst === undefined) return value;
    return dst === '' ? undefined : dst;
  }

}

export function parseMappingArg(arg: string): MappingPair {
  const eq = arg.indexOf('=');
  if (eq === -1) throw new MappingConfigError(`Mapping must be in the form SRC=DST, got '${arg}'`);
  const src = arg.slice(0, eq);
  if (!src) throw new MappingConfigError(`Mapping source must not be empty: '${arg}'`);
  return [src, arg.slice(eq + 1)];
}
