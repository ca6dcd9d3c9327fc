/**
 * Resource Resolver
 *
 * Picks the concrete network, SSH key and firewall for a creation request.
 * Selection is by presence only: one candidate wins outright, several need a
 * stored default that is still present, and anything else is an explicit
 * ambiguity the user resolves with setdefaults. Never guesses.
 */
import { AmbiguousSelectionError, NoneAvailableError } from "./errors.js";
import type { CatalogSnapshot } from "./catalog.js";
import { sortResourceRefs } from "./catalog.js";
import type { ResourceKind, ResourceRef, UserPreferences } from "./schema.js";
import { DEFAULT_FIELD } from "./schema.js";

export type ResolveResult =
  | { success: true; id: number; resource: ResourceRef; usedDefault: boolean }
  | { success: false; error: AmbiguousSelectionError | NoneAvailableError };

export function resolveResource(
  kind: ResourceKind,
  candidates: readonly ResourceRef[],
  userDefault?: number,
): ResolveResult {
  if (candidates.length === 0) {
    return { success: false, error: new NoneAvailableError(kind) };
  }

  if (candidates.length === 1) {
    const [only] = candidates;
    return { success: true, id: only.id, resource: only, usedDefault: false };
  }

  if (userDefault !== undefined) {
    const match = candidates.find((c) => c.id === userDefault);
    if (match) {
      return { success: true, id: match.id, resource: match, usedDefault: true };
    }
  }

  return {
    success: false,
    error: new AmbiguousSelectionError(kind, sortResourceRefs(candidates)),
  };
}

/** Candidates of a resolvable kind in a snapshot. */
export function candidatesFor(
  snapshot: CatalogSnapshot,
  kind: ResourceKind,
): readonly ResourceRef[] {
  switch (kind) {
    case "network":
      return snapshot.networks;
    case "sshKey":
      return snapshot.sshKeys;
    case "firewall":
      return snapshot.firewalls;
  }
}

export type ResolvedResources = Record<ResourceKind, ResourceRef>;

export type ResolveAllResult =
  | { success: true; resources: ResolvedResources }
  | { success: false; error: AmbiguousSelectionError | NoneAvailableError };

/** Resolves network, SSH key, then firewall; the first failure wins. */
export function resolveAll(
  snapshot: CatalogSnapshot,
  defaults: UserPreferences,
): ResolveAllResult {
  const network = resolveFromSnapshot(snapshot, "network", defaults);
  if (!network.success) return network;
  const sshKey = resolveFromSnapshot(snapshot, "sshKey", defaults);
  if (!sshKey.success) return sshKey;
  const firewall = resolveFromSnapshot(snapshot, "firewall", defaults);
  if (!firewall.success) return firewall;

  return {
    success: true,
    resources: {
      network: network.resource,
      sshKey: sshKey.resource,
      firewall: firewall.resource,
    },
  };
}

export function resolveFromSnapshot(
  snapshot: CatalogSnapshot,
  kind: ResourceKind,
  defaults: UserPreferences,
): ResolveResult {
  return resolveResource(kind, candidatesFor(snapshot, kind), defaults[DEFAULT_FIELD[kind]]);
}
