import semver from 'semver';

import type { NormalizedCatalogPack } from './pack.js';

const normalizeRuntimeVersion = (runtimeVersion: string | undefined): string | null => {
  if (!runtimeVersion) {
    return null;
  }
  const exactVersion = semver.valid(runtimeVersion);
  if (exactVersion) {
    return exactVersion;
  }

  const cleanedVersion = semver.clean(runtimeVersion);
  if (cleanedVersion) {
    return cleanedVersion;
  }

  const normalized = semver.coerce(runtimeVersion);
  return normalized ? normalized.version : null;
};

export interface CatalogCompatibility {
  readonly compatible: boolean;
  readonly runtimeVersion: string | null;
  readonly requiredRange?: string;
  readonly message?: string;
}

/**
 * Checks the pack's `engineCompatibility` range against a runtime version.
 * Packs without a declared range are accepted by every runtime.
 */
export const checkCatalogCompatibility = (
  pack: NormalizedCatalogPack,
  runtimeVersion: string | undefined,
): CatalogCompatibility => {
  const normalized = normalizeRuntimeVersion(runtimeVersion);
  const range = pack.metadata.engineCompatibility;

  if (range === undefined) {
    return { compatible: true, runtimeVersion: normalized };
  }

  if (normalized === null) {
    return {
      compatible: false,
      runtimeVersion: null,
      requiredRange: range,
      message: `Catalog "${pack.metadata.id}" requires engine ${range} but no runtime version was provided.`,
    };
  }

  if (semver.satisfies(normalized, range, { includePrerelease: true })) {
    return { compatible: true, runtimeVersion: normalized, requiredRange: range };
  }

  return {
    compatible: false,
    runtimeVersion: normalized,
    requiredRange: range,
    message: `Catalog "${pack.metadata.id}" requires engine ${range} (runtime is ${normalized}).`,
  };
};
