import type { StorageTableNames } from '../transformations/transformations.js';

export type RelationFeature = 'relation' | 'display' | 'columnComments' | 'browserTransformation' | 'uiPreferences';

/**
 * Where the configuration storage lives and which of its features are on.
 */
export interface RelationParameters {
  /** Storage database; null when no configuration storage is set up */
  db: string | null;
  tables: StorageTableNames;
  features: Record<RelationFeature, boolean>;
}

export interface RelationParametersInput {
  db?: string | null;
  tables?: StorageTableNames;
  features?: Partial<Record<RelationFeature, boolean>>;
}

/**
 * Without a storage database every feature is off; with one, features
 * default to on unless disabled.
 */
export function createRelationParameters(input: RelationParametersInput = {}): RelationParameters {
  const db = input.db ?? null;
  const enabled = db !== null;
  const features = input.features ?? {};
  return {
    db,
    tables: input.tables ?? {},
    features: {
      relation: enabled && (features.relation ?? true),
      display: enabled && (features.display ?? true),
      columnComments: enabled && (features.columnComments ?? true),
      browserTransformation: enabled && (features.browserTransformation ?? true),
      uiPreferences: enabled && (features.uiPreferences ?? true),
    },
  };
}
