/**
 * Capability descriptors: what a problem requires, or what a solver supports.
 *
 * A descriptor maps a category (e.g. "typing") to a set of feature tags drawn
 * from that category's closed vocabulary. Descriptors are ordered by
 * subsumption: `A ≤ B` iff every category present in A has its tags included
 * in B's tags for that category. A category absent from B counts as empty.
 */

import { z } from "zod";
import { ConfigurationError, ContractViolationError } from "./errors.js";

const LOG_PREFIX = "planwire-core:capabilities";

// ── Vocabulary ──────────────────────────────────────────────────────

export const CAPABILITY_VOCABULARY = {
  problem_class: ["ACTION_BASED", "HIERARCHICAL"],
  time: [
    "CONTINUOUS_TIME",
    "DISCRETE_TIME",
    "INTERMEDIATE_CONDITIONS_AND_EFFECTS",
    "TIMED_EFFECT",
    "TIMED_GOALS",
    "DURATION_INEQUALITIES",
  ],
  numbers: ["CONTINUOUS_NUMBERS", "DISCRETE_NUMBERS"],
  conditions: [
    "NEGATIVE_CONDITIONS",
    "DISJUNCTIVE_CONDITIONS",
    "EQUALITY",
    "EXISTENTIAL_CONDITIONS",
    "UNIVERSAL_CONDITIONS",
  ],
  effects: ["CONDITIONAL_EFFECTS", "INCREASE_EFFECTS", "DECREASE_EFFECTS"],
  typing: ["FLAT_TYPING", "HIERARCHICAL_TYPING"],
  fluents: ["NUMERIC_FLUENTS", "OBJECT_FLUENTS"],
  quality_metrics: ["ACTIONS_COST", "PLAN_LENGTH", "MAKESPAN", "FINAL_VALUE"],
} as const;

export type CapabilityCategory = keyof typeof CAPABILITY_VOCABULARY;

export type CapabilityTag<C extends CapabilityCategory = CapabilityCategory> =
  (typeof CAPABILITY_VOCABULARY)[C][number];

export const CAPABILITY_CATEGORIES: readonly CapabilityCategory[] = [
  "problem_class",
  "time",
  "numbers",
  "conditions",
  "effects",
  "typing",
  "fluents",
  "quality_metrics",
];

export function isCapabilityCategory(value: string): value is CapabilityCategory {
  return Object.prototype.hasOwnProperty.call(CAPABILITY_VOCABULARY, value);
}

export function isCapabilityTag<C extends CapabilityCategory>(
  category: C,
  tag: string
): tag is CapabilityTag<C> {
  const tags: readonly string[] = CAPABILITY_VOCABULARY[category];
  return tags.includes(tag);
}

// ── Wire form ───────────────────────────────────────────────────────

/**
 * JSON form of a descriptor. A key present with `[]` is a declared, empty
 * category; a missing key is an absent one.
 */
export const CapabilityRecordSchema = z
  .object({
    problem_class: z.array(z.enum(CAPABILITY_VOCABULARY.problem_class)).optional(),
    time: z.array(z.enum(CAPABILITY_VOCABULARY.time)).optional(),
    numbers: z.array(z.enum(CAPABILITY_VOCABULARY.numbers)).optional(),
    conditions: z.array(z.enum(CAPABILITY_VOCABULARY.conditions)).optional(),
    effects: z.array(z.enum(CAPABILITY_VOCABULARY.effects)).optional(),
    typing: z.array(z.enum(CAPABILITY_VOCABULARY.typing)).optional(),
    fluents: z.array(z.enum(CAPABILITY_VOCABULARY.fluents)).optional(),
    quality_metrics: z.array(z.enum(CAPABILITY_VOCABULARY.quality_metrics)).optional(),
  })
  .strict();

export type CapabilityRecord = z.infer<typeof CapabilityRecordSchema>;

// ── Descriptor ──────────────────────────────────────────────────────

export class CapabilityDescriptor {
  private readonly entries: ReadonlyMap<CapabilityCategory, ReadonlySet<string>>;

  private constructor(entries: Map<CapabilityCategory, ReadonlySet<string>>) {
    this.entries = entries;
    Object.freeze(this);
  }

  static builder(): CapabilityDescriptorBuilder {
    return new CapabilityDescriptorBuilder((entries) => new CapabilityDescriptor(entries));
  }

  static empty(): CapabilityDescriptor {
    return CapabilityDescriptor.builder().build();
  }

  /** Every tag of every category. */
  static all(): CapabilityDescriptor {
    const builder = CapabilityDescriptor.builder();
    for (const category of CAPABILITY_CATEGORIES) {
      builder.declare(category);
      for (const tag of CAPABILITY_VOCABULARY[category]) {
        builder.add(category, tag);
      }
    }
    return builder.build();
  }

  /**
   * Build from the wire form (or any untrusted JSON).
   *
   * @throws ConfigurationError on unknown categories or tags
   */
  static fromRecord(input: unknown): CapabilityDescriptor {
    const parsed = CapabilityRecordSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError({
        message: `${LOG_PREFIX}:fromRecord - Unknown capability category or tag`,
        details: parsed.error.flatten(),
      });
    }
    const builder = CapabilityDescriptor.builder();
    for (const category of CAPABILITY_CATEGORIES) {
      const tags: readonly string[] | undefined = parsed.data[category];
      if (!tags) continue;
      builder.declare(category);
      for (const tag of tags) builder.add(category, tag);
    }
    return builder.build();
  }

  /** True when the category is present, even with no tags. */
  declares(category: CapabilityCategory): boolean {
    return this.entries.has(category);
  }

  has<C extends CapabilityCategory>(category: C, tag: CapabilityTag<C>): boolean {
    return this.entries.get(category)?.has(tag) ?? false;
  }

  /** Tags of a category, in vocabulary order. */
  tags(category: CapabilityCategory): CapabilityTag[] {
    const present = this.entries.get(category);
    if (!present) return [];
    const vocabulary: readonly CapabilityTag[] = CAPABILITY_VOCABULARY[category];
    return vocabulary.filter((tag) => present.has(tag));
  }

  categories(): CapabilityCategory[] {
    return CAPABILITY_CATEGORIES.filter((category) => this.entries.has(category));
  }

  /** `this ≤ other`. */
  isSubsumedBy(other: CapabilityDescriptor): boolean {
    for (const [category, tags] of this.entries) {
      const available = other.entries.get(category);
      for (const tag of tags) {
        if (!available?.has(tag)) return false;
      }
    }
    return true;
  }

  /** `problemCaps ≤ this`: a solver advertising `this` can take the problem. */
  supports(problemCaps: CapabilityDescriptor): boolean {
    return problemCaps.isSubsumedBy(this);
  }

  /** Tags of `this` that `other` does not cover. Empty iff `this ≤ other`. */
  missingFrom(other: CapabilityDescriptor): CapabilityRecord {
    const builder = CapabilityDescriptor.builder();
    for (const category of this.categories()) {
      for (const tag of this.tags(category)) {
        if (!other.entries.get(category)?.has(tag)) builder.add(category, tag);
      }
    }
    return builder.build().toRecord();
  }

  equals(other: CapabilityDescriptor): boolean {
    if (this.entries.size !== other.entries.size) return false;
    for (const [category, tags] of this.entries) {
      const theirs = other.entries.get(category);
      if (!theirs || theirs.size !== tags.size) return false;
      for (const tag of tags) {
        if (!theirs.has(tag)) return false;
      }
    }
    return true;
  }

  toRecord(): CapabilityRecord {
    const record: Record<string, string[]> = {};
    for (const category of this.categories()) {
      record[category] = this.tags(category);
    }
    return CapabilityRecordSchema.parse(record);
  }

  /** `typing:FLAT_TYPING, conditions:EQUALITY`; `(none)` when there are no tags. */
  describe(): string {
    const parts: string[] = [];
    for (const category of this.categories()) {
      for (const tag of this.tags(category)) parts.push(`${category}:${tag}`);
    }
    return parts.length > 0 ? parts.join(", ") : "(none)";
  }

  toJSON(): CapabilityRecord {
    return this.toRecord();
  }
}

// ── Builder ─────────────────────────────────────────────────────────

export class CapabilityDescriptorBuilder {
  private entries = new Map<CapabilityCategory, Set<string>>();
  private sealed = false;

  constructor(
    private readonly finish: (entries: Map<CapabilityCategory, ReadonlySet<string>>) => CapabilityDescriptor
  ) {}

  /** Enable a tag, declaring its category if needed. */
  set<C extends CapabilityCategory>(category: C, tag: CapabilityTag<C>): this {
    return this.add(category, tag);
  }

  /** Declare a category with no tags (distinct from leaving it absent). */
  declare(category: string): this {
    this.ensureOpen("declare");
    const known = this.knownCategory(category, "declare");
    if (!this.entries.has(known)) this.entries.set(known, new Set());
    return this;
  }

  /** Untyped variant of `set` for values read from JSON or config. */
  add(category: string, tag: string): this {
    this.ensureOpen("add");
    const known = this.knownCategory(category, "add");
    if (!isCapabilityTag(known, tag)) {
      throw new ConfigurationError({
        message: `${LOG_PREFIX}:add - Unknown tag "${tag}" in category "${category}"`,
        details: { category, tag },
      });
    }
    const tags = this.entries.get(known) ?? new Set<string>();
    tags.add(tag);
    this.entries.set(known, tags);
    return this;
  }

  build(): CapabilityDescriptor {
    this.ensureOpen("build");
    this.sealed = true;
    const frozen = new Map<CapabilityCategory, ReadonlySet<string>>();
    for (const [category, tags] of this.entries) frozen.set(category, new Set(tags));
    return this.finish(frozen);
  }

  private knownCategory(category: string, method: string): CapabilityCategory {
    if (!isCapabilityCategory(category)) {
      throw new ConfigurationError({
        message: `${LOG_PREFIX}:${method} - Unknown capability category "${category}"`,
        details: { category, known: CAPABILITY_CATEGORIES },
      });
    }
    return category;
  }

  private ensureOpen(method: string): void {
    if (this.sealed) {
      throw new ContractViolationError({
        message: `${LOG_PREFIX}:${method} - Descriptor already built; capabilities are immutable`,
      });
    }
  }
}
