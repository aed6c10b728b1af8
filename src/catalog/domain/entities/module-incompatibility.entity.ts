/**
 * Unordered pair of modules that must never be held together.
 *
 * Stored normalized (`moduleAId < moduleBId`); readers must treat the pair as
 * symmetric.
 */
export interface ModuleIncompatibility {
  moduleAId: number;
  moduleBId: number;
  reason?: string;
}
