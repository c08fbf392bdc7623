export const CANONICAL_ENTITY_TYPES = [
  'Gene',
  'Protein',
  'Trait',
  'Metabolite',
  'Enzyme',
  'Factor',
] as const;
export type CanonicalEntityType = (typeof CANONICAL_ENTITY_TYPES)[number];

export const DEFAULT_ENTITY_TYPE: CanonicalEntityType = 'Factor';

export const CANONICAL_RELATIONS = [
  'encodes',
  'regulates',
  'increases',
  'decreases',
  'influences',
  'associated_with',
  'localizes_to',
  'activates',
  'inhibits',
  'is_related_to',
] as const;
export type CanonicalRelation = (typeof CANONICAL_RELATIONS)[number];

export const DEFAULT_RELATION: CanonicalRelation = 'is_related_to';

/** Verb lemmas and inflections shared by the dependency-based backends. */
const VERB_RELATIONS: Record<string, CanonicalRelation> = {
  encode: 'encodes',
  encodes: 'encodes',
  regulate: 'regulates',
  regulates: 'regulates',
  control: 'regulates',
  controls: 'regulates',
  increase: 'increases',
  increases: 'increases',
  enhance: 'increases',
  enhances: 'increases',
  decrease: 'decreases',
  decreases: 'decreases',
  reduce: 'decreases',
  reduces: 'decreases',
  affect: 'influences',
  affects: 'influences',
  influence: 'influences',
  influences: 'influences',
  associate: 'associated_with',
  associates: 'associated_with',
  correlate: 'associated_with',
  correlates: 'associated_with',
  activate: 'activates',
  activates: 'activates',
  inhibit: 'inhibits',
  inhibits: 'inhibits',
};

function isCanonicalRelation(value: string): value is CanonicalRelation {
  return (CANONICAL_RELATIONS as readonly string[]).includes(value);
}

export function relationFromVerb(verb: string): CanonicalRelation | null {
  return VERB_RELATIONS[verb.toLowerCase()] ?? null;
}

export function canonicalRelation(label: string): CanonicalRelation {
  const lowered = label.trim().toLowerCase();
  if (isCanonicalRelation(lowered)) return lowered;
  return relationFromVerb(lowered) ?? DEFAULT_RELATION;
}

export function canonicalEntityType(
  label: string,
  mapping: Readonly<Record<string, CanonicalEntityType>>
): CanonicalEntityType {
  return mapping[label] ?? DEFAULT_ENTITY_TYPE;
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
