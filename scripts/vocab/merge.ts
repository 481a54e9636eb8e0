import {
  ROW_FIELDS,
  canonicalizeRow,
  rowKeyId,
  rowsEqual,
  type RowInput,
  type RowKey,
  type VocabularyRow,
} from "@shared/vocabulary";

export interface MergePolicy {
  /** Only fill fields that are empty on the stored row. Wins over `preferIncoming`. */
  fillBlankOnly: boolean;
  /** Non-empty incoming fields overwrite stored ones. */
  preferIncoming: boolean;
}

export type MergePolicyName = "fill-blank" | "prefer-incoming" | "conflict-aware";

export const DEFAULT_MERGE_POLICY: MergePolicy = { fillBlankOnly: true, preferIncoming: false };

export function mergePolicyFromName(name: MergePolicyName): MergePolicy {
  switch (name) {
    case "fill-blank":
      return { fillBlankOnly: true, preferIncoming: false };
    case "prefer-incoming":
      return { fillBlankOnly: false, preferIncoming: true };
    case "conflict-aware":
      return { fillBlankOnly: false, preferIncoming: false };
  }
}

export interface MergeResult {
  rows: VocabularyRow[];
  added: number;
  updated: number;
  /** Keys of appended rows, in incoming order. */
  addedKeys: RowKey[];
}

type FieldResolver = (stored: string, incoming: string) => string;

function resolverFor(policy: MergePolicy): FieldResolver {
  if (policy.fillBlankOnly) {
    return (stored, incoming) => stored || incoming;
  }
  if (policy.preferIncoming) {
    return (stored, incoming) => incoming || stored;
  }
  return (stored, incoming) => (incoming && incoming !== stored ? incoming : stored);
}

export function resolveRow(
  stored: VocabularyRow,
  incoming: VocabularyRow,
  policy: MergePolicy,
): VocabularyRow {
  const resolve = resolverFor(policy);
  const fields = ROW_FIELDS.map((field) => resolve(stored[field], incoming[field]));
  return canonicalizeRow(fields);
}

/**
 * Folds `incoming` into `existing` by (term, reading). Stored rows keep their
 * order and are never removed; new keys are appended in incoming order.
 * When the stored table already repeats a key, its last occurrence is updated.
 * The caller serialises concurrent merges against the same table.
 */
export function mergeRows(
  existing: readonly RowInput[],
  incoming: readonly RowInput[],
  policy: MergePolicy = DEFAULT_MERGE_POLICY,
): MergeResult {
  const rows = existing.map(canonicalizeRow);
  const index = new Map<string, number>();
  rows.forEach((row, position) => {
    if (!row.term) return;
    index.set(rowKeyId(row), position);
  });

  let added = 0;
  let updated = 0;
  const addedKeys: RowKey[] = [];

  for (const input of incoming) {
    const row = canonicalizeRow(input);
    if (!row.term) continue;

    const id = rowKeyId(row);
    const position = index.get(id);
    if (position === undefined) {
      index.set(id, rows.length);
      rows.push(row);
      added += 1;
      addedKeys.push({ term: row.term, reading: row.reading });
      continue;
    }

    const stored = rows[position];
    const resolved = resolveRow(stored, row, policy);
    if (!rowsEqual(stored, resolved)) {
      rows[position] = resolved;
      updated += 1;
    }
  }

  return { rows, added, updated, addedKeys };
}
