/**
 * Command Handler
 *
 * The surface a chat front end (or the CLI) talks to. Each command is a plain
 * object; each response is either `{ status: "ok", body }` with a body tagged
 * by command, or `{ status: "error", error }` with a stable error code. The
 * handler never renders anything.
 */
import { z } from "zod";

import type { CatalogEntry, CatalogSummary, ResourceCache } from "./catalog.js";
import { listCatalog, sortResourceRefs, summarizeCatalog } from "./catalog.js";
import type { ErrorPayload } from "./errors.js";
import { ValidationError, describeError, toErrorPayload } from "./errors.js";
import type { PreferenceStore } from "./preferences.js";
import type {
  CloudProvider,
  Logger,
  MachineOutcome,
  ServerDetails,
  VmProvisioner,
} from "./provisioner.js";
import { candidatesFor, resolveFromSnapshot } from "./resolver.js";
import type { ResolvedResources } from "./resolver.js";
import type {
  CatalogKind,
  ResourceKind,
  ResourceRef,
  ServerOwnership,
  UserPreferences,
} from "./schema.js";
import { catalogKindSchema, defaultsUpdateSchema, DEFAULT_FIELD, resourceKindSchema } from "./schema.js";

// -- Requests --

const userIdSchema = z.string().trim().min(1, "user id is required");

export const commandRequestSchema = z.discriminatedUnion("command", [
  z.object({ command: z.literal("refresh") }),
  z.object({ command: z.literal("list"), kind: catalogKindSchema }),
  z.object({ command: z.literal("resolve_preview"), kind: resourceKindSchema, userId: userIdSchema }),
  z.object({ command: z.literal("set_defaults"), userId: userIdSchema, defaults: defaultsUpdateSchema }),
  z.object({ command: z.literal("create"), request: z.unknown() }),
  z.object({ command: z.literal("lookup"), userId: userIdSchema, nameOrId: z.string() }),
  z.object({
    command: z.literal("suggest"),
    kind: z.enum(["locations", "images"]),
    query: z.string().default(""),
  }),
]);

export type CommandRequest = z.input<typeof commandRequestSchema>;

// -- Responses --

export type CommandBody =
  | { command: "refresh"; refreshedAt: string; summary: CatalogSummary }
  | { command: "list"; kind: CatalogKind; entries: CatalogEntry[] }
  | {
      command: "resolve_preview";
      kind: ResourceKind;
      candidates: ResourceRef[];
      defaultId: number | null;
      /** What a create would use right now, or null if it would fail */
      selected: ResourceRef | null;
      problem: ErrorPayload | null;
    }
  | { command: "set_defaults"; userId: string; defaults: UserPreferences }
  | {
      command: "create";
      baseName: string;
      resources: ResolvedResources;
      outcome: MachineOutcome[];
    }
  | {
      command: "lookup";
      server: ServerOwnership;
      details: ServerDetails | null;
      detailsError: string | null;
    }
  | { command: "suggest"; names: string[] };

export type CommandResponse =
  | { status: "ok"; body: CommandBody }
  | { status: "error"; error: ErrorPayload };

export interface CommandDeps {
  cache: ResourceCache;
  preferences: PreferenceStore;
  provisioner: VmProvisioner;
  provider: CloudProvider;
  logger?: Logger;
}

export interface CommandOptions {
  signal?: AbortSignal;
}

function ok(body: CommandBody): CommandResponse {
  return { status: "ok", body };
}

/**
 * Creates the command handler.
 * Unexpected exceptions are logged and returned as INTERNAL_ERROR.
 */
export function createCommandHandler(deps: CommandDeps) {
  const logger = deps.logger ?? console;

  async function dispatch(input: unknown, opts: CommandOptions): Promise<CommandResponse> {
    const parsed = commandRequestSchema.safeParse(input);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      return {
        status: "error",
        error: toErrorPayload(
          new ValidationError("INVALID_REQUEST", issue?.message ?? "Invalid command", {
            issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
          }),
        ),
      };
    }
    const req = parsed.data;

    switch (req.command) {
      case "refresh": {
        const snapshot = await deps.cache.refresh();
        return ok({
          command: "refresh",
          refreshedAt: snapshot.refreshedAt,
          summary: summarizeCatalog(snapshot),
        });
      }

      case "list": {
        const snapshot = await deps.cache.ensure();
        return ok({ command: "list", kind: req.kind, entries: listCatalog(snapshot, req.kind) });
      }

      case "resolve_preview": {
        const snapshot = await deps.cache.ensure();
        const defaults = await deps.preferences.getDefaults(req.userId);
        const result = resolveFromSnapshot(snapshot, req.kind, defaults);
        return ok({
          command: "resolve_preview",
          kind: req.kind,
          candidates: sortResourceRefs(candidatesFor(snapshot, req.kind)),
          defaultId: defaults[DEFAULT_FIELD[req.kind]] ?? null,
          selected: result.success ? result.resource : null,
          problem: result.success ? null : toErrorPayload(result.error),
        });
      }

      case "set_defaults": {
        const defaults = await deps.preferences.setDefaults(req.userId, req.defaults);
        return ok({ command: "set_defaults", userId: req.userId, defaults });
      }

      case "create": {
        const result = await deps.provisioner.create(req.request, { signal: opts.signal });
        if (!result.success) {
          return { status: "error", error: toErrorPayload(result.error) };
        }
        return ok({
          command: "create",
          baseName: result.request.baseName,
          resources: result.resources,
          outcome: result.outcome,
        });
      }

      case "lookup": {
        const server = await deps.preferences.lookupServer(req.userId, req.nameOrId);
        try {
          const details = await deps.provider.getServer(server.serverId, { signal: opts.signal });
          return ok({ command: "lookup", server, details, detailsError: null });
        } catch (err) {
          return ok({ command: "lookup", server, details: null, detailsError: describeError(err) });
        }
      }

      case "suggest":
        return ok({ command: "suggest", names: deps.cache.suggest(req.kind, req.query) });
    }
  }

  return async (input: unknown, opts: CommandOptions = {}): Promise<CommandResponse> => {
    try {
      return await dispatch(input, opts);
    } catch (err) {
      const error = toErrorPayload(err);
      if (error.code === "INTERNAL_ERROR") {
        logger.error(`[hcloud] Command failed: ${error.message}`);
      }
      return { status: "error", error };
    }
  };
}

export type CommandHandler = ReturnType<typeof createCommandHandler>;
