/**
 * Provisioner Error Taxonomy
 *
 * Every failure the core can report is a ProvisionerError subclass with a
 * stable `code` and structured `details`, so the command surface can render
 * it without parsing messages. Expected decision points (ambiguity, empty
 * account) are errors too: they carry the data the user needs to resolve them.
 */
import type { ResourceKind, ResourceRef } from "./schema.js";

export type ProvisionerErrorCode =
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "AMBIGUOUS_SELECTION"
  | "NONE_AVAILABLE"
  | "QUOTA_EXCEEDED"
  | "PROVIDER_ERROR"
  | "PERSISTENCE_ERROR"
  | "NOT_FOUND"
  | "DUPLICATE_NAME";

export abstract class ProvisionerError extends Error {
  abstract readonly code: ProvisionerErrorCode;

  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** Missing or malformed startup configuration. Fatal. */
export class ConfigError extends ProvisionerError {
  readonly code = "CONFIG_ERROR" as const;

  constructor(public readonly issues: string[]) {
    super(`Configuration invalid:\n${issues.map((i) => `  ${i}`).join("\n")}`, {
      issues,
    });
  }
}

export type ValidationReason =
  | "INVALID_IMAGE"
  | "INVALID_LOCATION"
  | "INVALID_COUNT"
  | "INVALID_NAME"
  | "INVALID_APP_PROFILE"
  | "UNKNOWN_SERVER_TYPE"
  | "INVALID_REQUEST";

export class ValidationError extends ProvisionerError {
  readonly code = "VALIDATION_ERROR" as const;

  constructor(
    public readonly reason: ValidationReason,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message, { reason, ...details });
  }
}

const KIND_LABELS: Record<ResourceKind, string> = {
  network: "network",
  sshKey: "SSH key",
  firewall: "firewall",
};

export function kindLabel(kind: ResourceKind): string {
  return KIND_LABELS[kind];
}

export class AmbiguousSelectionError extends ProvisionerError {
  readonly code = "AMBIGUOUS_SELECTION" as const;

  constructor(
    public readonly kind: ResourceKind,
    public readonly candidates: readonly ResourceRef[],
  ) {
    const label = kindLabel(kind);
    const lines = candidates.map((c) => `- ${c.name} (id ${c.id})`);
    super(
      `Multiple ${label}s exist, and no default is set.\n` +
        `Use setdefaults to choose IDs.\n\n` +
        `Available ${label}s:\n${lines.join("\n")}`,
      { kind, candidates },
    );
  }
}

export class NoneAvailableError extends ProvisionerError {
  readonly code = "NONE_AVAILABLE" as const;

  constructor(public readonly kind: ResourceKind) {
    super(`No ${kindLabel(kind)} exists in this Hetzner project.`, { kind });
  }
}

export class QuotaExceededError extends ProvisionerError {
  readonly code = "QUOTA_EXCEEDED" as const;

  constructor(
    public readonly requested: number,
    public readonly remaining: number,
  ) {
    super(
      remaining <= 0
        ? "Hetzner server limit reached on this account."
        : `You requested ${requested} VM(s), but the account only has quota for ${remaining} more.`,
      { requested, remaining },
    );
  }
}

export class ProviderError extends ProvisionerError {
  readonly code = "PROVIDER_ERROR" as const;

  constructor(
    message: string,
    public readonly statusCode: number | null = null,
    public readonly apiCode: string | null = null,
  ) {
    super(message, { statusCode, apiCode });
  }

  /** Hetzner reports exhausted server quota as `resource_limit_exceeded`. */
  get isResourceLimit(): boolean {
    if (this.apiCode === "resource_limit_exceeded") return true;
    const msg = this.message.toLowerCase();
    return msg.includes("resource_limit_exceeded") || msg.includes("limit reached");
  }
}

export class PersistenceError extends ProvisionerError {
  readonly code = "PERSISTENCE_ERROR" as const;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? {} : { cause: String(cause) });
  }
}

export class NotFoundError extends ProvisionerError {
  readonly code = "NOT_FOUND" as const;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, details);
  }
}

export class DuplicateNameError extends ProvisionerError {
  readonly code = "DUPLICATE_NAME" as const;

  constructor(
    public readonly userId: string,
    public readonly serverName: string,
  ) {
    super(`You already own a server named "${serverName}".`, { userId, serverName });
  }
}

export interface ErrorPayload {
  code: ProvisionerErrorCode | "INTERNAL_ERROR";
  message: string;
  details: Record<string, unknown>;
}

export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof ProvisionerError) {
    return { code: err.code, message: err.message, details: err.details };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { code: "INTERNAL_ERROR", message, details: {} };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
