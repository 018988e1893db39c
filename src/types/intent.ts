export const ACTION_KINDS = ['WriteDispatchLog', 'ReadResource', 'SendNotification', 'Unknown'] as const;
export type ActionKind = typeof ACTION_KINDS[number];

export const DISASTER_CATEGORIES = [
  'flood',
  'earthquake',
  'wildfire',
  'cyclone',
  'infrastructure',
  'evacuation',
  'search_rescue',
  'logistics',
  'unknown'
] as const;
export type DisasterCategory = typeof DISASTER_CATEGORIES[number];

const categoryValues: readonly string[] = DISASTER_CATEGORIES;

export function isDisasterCategory(value: string): value is DisasterCategory {
  return categoryValues.includes(value);
}

/**
 * A single proposed action awaiting judgment. Instances are frozen at
 * construction; a corrected attempt is a new Intent.
 */
export interface Intent {
  readonly actionKind: ActionKind;
  readonly rawText: string;
  readonly proposedPath?: string;
  readonly category: DisasterCategory;
  readonly keywords: ReadonlySet<string>;
  readonly metadata: Readonly<Record<string, unknown>>;
}
