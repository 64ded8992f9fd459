import { logger } from "../logger.js";
import { formatQuantity } from "../parser/quantity.js";
import {
  isList,
  isQuantity,
  type AdditiveKey,
  type ConfigValue,
  type MergedEntry,
  type MergedSection,
  type ProductChain,
} from "../types/config.js";

/** Keys whose values accumulate across the chain instead of being replaced. */
export const DEFAULT_ADDITIVE_KEYS: readonly AdditiveKey[] = [
  { section: "Payload", key: "updates_repositories" },
  { section: "User Interface", key: "default_help_pages" },
];

export interface MergeOptions {
  additiveKeys?: readonly AdditiveKey[];
}

/**
 * The merged section → key → value mapping. Open-ended: sections and keys the
 * engine knows nothing about are carried through untouched.
 */
export class EffectiveConfig {
  private readonly data: ReadonlyMap<string, MergedSection>;

  constructor(data: ReadonlyMap<string, MergedSection>) {
    this.data = data;
  }

  sectionNames(): string[] {
    return [...this.data.keys()];
  }

  section(name: string): ReadonlyMap<string, ConfigValue> {
    const out = new Map<string, ConfigValue>();
    for (const [key, entry] of this.data.get(name) ?? []) out.set(key, entry.value);
    return out;
  }

  has(section: string, key: string): boolean {
    return this.data.get(section)?.has(key) ?? false;
  }

  get(section: string, key: string): ConfigValue | undefined {
    return this.data.get(section)?.get(key)?.value;
  }

  /** Path of the file whose value won for this key. */
  sourceOf(section: string, key: string): string | undefined {
    return this.data.get(section)?.get(key)?.source;
  }

  toJSON(): Record<string, Record<string, unknown>> {
    const out: Record<string, Record<string, unknown>> = {};
    for (const [name, section] of this.data) {
      const keys: Record<string, unknown> = {};
      for (const [key, entry] of section) {
        keys[key] = isQuantity(entry.value) ? formatQuantity(entry.value) : entry.value;
      }
      out[name] = keys;
    }
    return out;
  }

  /** Canonical text form, in the same syntax as the input files. */
  serialize(): string {
    const blocks: string[] = [];
    for (const [name, section] of this.data) {
      const lines = [`[${name}]`];
      for (const [key, entry] of section) {
        const { value } = entry;
        if (isQuantity(value)) lines.push(`${key} = ${formatQuantity(value)}`);
        else if (isList(value)) lines.push(`${key} =`, ...value.map((item) => `    ${item}`));
        else lines.push(`${key} = ${value}`);
      }
      blocks.push(lines.join("\n"));
    }
    return blocks.join("\n\n") + "\n";
  }
}

function additiveSet(keys: readonly AdditiveKey[]): Set<string> {
  return new Set(keys.map((k) => `${k.section}\u0000${k.key}`));
}

function asItems(value: ConfigValue): readonly string[] {
  if (isQuantity(value)) return [formatQuantity(value)];
  if (isList(value)) return value;
  return value === "" ? [] : [value];
}

function appendUnique(existing: readonly string[], incoming: readonly string[]): string[] {
  const out = [...existing];
  const seen = new Set(existing);
  for (const item of incoming) {
    if (seen.has(item)) continue;
    seen.add(item);
    out.push(item);
  }
  return out;
}

/**
 * Merge a product chain, earliest entry first. The latest value for a key
 * wins; additive keys concatenate in chain order with duplicates dropped.
 */
export function mergeChain(chain: ProductChain, options: MergeOptions = {}): EffectiveConfig {
  const additive = additiveSet(options.additiveKeys ?? DEFAULT_ADDITIVE_KEYS);
  const merged = new Map<string, Map<string, MergedEntry>>();

  for (const { file } of chain) {
    for (const [sectionName, section] of file.sections) {
      let target = merged.get(sectionName);
      if (!target) {
        target = new Map();
        merged.set(sectionName, target);
      }
      for (const [key, entry] of section) {
        const previous = target.get(key);
        if (additive.has(`${sectionName}\u0000${key}`)) {
          const items = appendUnique(previous ? asItems(previous.value) : [], asItems(entry.value));
          target.set(key, Object.freeze({ value: Object.freeze(items), source: file.path }));
        } else {
          target.set(key, Object.freeze({ value: entry.value, source: file.path }));
        }
      }
    }
  }

  logger.debug({ files: chain.length, sections: merged.size }, "Configuration chain merged");
  return new EffectiveConfig(merged);
}
