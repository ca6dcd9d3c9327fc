/**
 * Preference Store
 *
 * Per-user defaults (network / SSH key / firewall IDs) and the registry of
 * servers each user has created. Defaults are not checked against the catalog
 * when written; the resolver ignores stale ones at creation time.
 *
 * Writes for one user are serialized through a keyed lock. The backing
 * repository is pluggable: memory for tests, a JSON file for the CLI.
 */
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

import { KeyedLock } from "./keyed-lock.js";
import { DuplicateNameError, NotFoundError, PersistenceError, ProvisionerError, describeError } from "./errors.js";
import type { Logger } from "./provisioner.js";
import type { DefaultsUpdate, ServerOwnership, UserPreferences } from "./schema.js";
import { defaultsUpdateSchema, serverOwnershipSchema } from "./schema.js";

// -- Repository --

export interface PreferenceRepository {
  getDefaults(userId: string): Promise<UserPreferences | undefined>;
  putDefaults(userId: string, prefs: UserPreferences): Promise<void>;
  listServers(userId: string): Promise<ServerOwnership[]>;
  insertServer(record: ServerOwnership): Promise<void>;
}

export class MemoryPreferenceRepository implements PreferenceRepository {
  private defaults = new Map<string, UserPreferences>();
  private servers: ServerOwnership[] = [];

  async getDefaults(userId: string): Promise<UserPreferences | undefined> {
    const prefs = this.defaults.get(userId);
    return prefs ? { ...prefs } : undefined;
  }

  async putDefaults(userId: string, prefs: UserPreferences): Promise<void> {
    this.defaults.set(userId, { ...prefs });
  }

  async listServers(userId: string): Promise<ServerOwnership[]> {
    return this.servers.filter((s) => s.userId === userId).map((s) => ({ ...s }));
  }

  async insertServer(record: ServerOwnership): Promise<void> {
    this.servers.push({ ...record });
  }
}

const storeFileSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string(),
  defaults: z.record(defaultsUpdateSchema),
  servers: z.array(serverOwnershipSchema),
});

type StoreFile = z.infer<typeof storeFileSchema>;

function emptyStoreFile(): StoreFile {
  return { version: 1, updatedAt: new Date().toISOString(), defaults: {}, servers: [] };
}

/**
 * Keeps the whole store in one JSON file. Every mutation writes the next
 * state to a temp file and renames it over the original; the in-memory copy
 * only advances once that write succeeds.
 */
export class JsonFilePreferenceRepository implements PreferenceRepository {
  private state: Promise<StoreFile> | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(private storagePath: string) {}

  async getDefaults(userId: string): Promise<UserPreferences | undefined> {
    const state = await this.load();
    const prefs = state.defaults[userId];
    return prefs ? { ...prefs } : undefined;
  }

  putDefaults(userId: string, prefs: UserPreferences): Promise<void> {
    return this.mutate((state) => ({
      ...state,
      defaults: { ...state.defaults, [userId]: { ...prefs } },
    }));
  }

  async listServers(userId: string): Promise<ServerOwnership[]> {
    const state = await this.load();
    return state.servers.filter((s) => s.userId === userId).map((s) => ({ ...s }));
  }

  insertServer(record: ServerOwnership): Promise<void> {
    return this.mutate((state) => ({
      ...state,
      servers: [...state.servers, { ...record }],
    }));
  }

  private load(): Promise<StoreFile> {
    if (!this.state) {
      // A failed load is retried on the next access
      this.state = this.readFromDisk().catch((err: unknown) => {
        this.state = null;
        throw err;
      });
    }
    return this.state;
  }

  private async readFromDisk(): Promise<StoreFile> {
    let raw: string;
    try {
      raw = await readFile(this.storagePath, "utf-8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return emptyStoreFile();
      throw new PersistenceError(`Failed to read ${this.storagePath}`, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(`${this.storagePath} is not valid JSON`, err);
    }
    const parsed = storeFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError(
        `${this.storagePath} does not match the expected format: ${parsed.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ")}`,
      );
    }
    return parsed.data;
  }

  private mutate(apply: (state: StoreFile) => StoreFile): Promise<void> {
    const run = this.queue.then(async () => {
      const current = await this.load();
      const next = { ...apply(current), updatedAt: new Date().toISOString() };
      await this.writeToDisk(next);
      this.state = Promise.resolve(next);
    });
    // Keep the queue moving; the caller still sees the failure through `run`
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async writeToDisk(state: StoreFile): Promise<void> {
    const tmp = `${this.storagePath}.tmp`;
    try {
      await mkdir(dirname(this.storagePath), { recursive: true });
      await writeFile(tmp, JSON.stringify(state, null, 2));
      await rename(tmp, this.storagePath);
    } catch (err) {
      throw new PersistenceError(`Failed to write ${this.storagePath}`, err);
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

// -- Store --

export class PreferenceStore {
  private locks = new KeyedLock();

  constructor(
    private repo: PreferenceRepository,
    private logger: Logger = console,
  ) {}

  async getDefaults(userId: string): Promise<UserPreferences> {
    const prefs = await this.guard("read defaults", () => this.repo.getDefaults(userId));
    return prefs ?? {};
  }

  /** Provided fields overwrite; omitted fields keep their stored value. */
  setDefaults(userId: string, update: DefaultsUpdate): Promise<UserPreferences> {
    return this.locks.run(userId, async () => {
      const existing = await this.guard("read defaults", () => this.repo.getDefaults(userId));
      const next: UserPreferences = { ...existing };
      if (update.networkId !== undefined) next.networkId = update.networkId;
      if (update.sshKeyId !== undefined) next.sshKeyId = update.sshKeyId;
      if (update.firewallId !== undefined) next.firewallId = update.firewallId;
      await this.guard("save defaults", () => this.repo.putDefaults(userId, next));
      this.logger.info(`[preferences] Defaults updated for ${userId}`);
      return next;
    });
  }

  recordOwnership(userId: string, serverName: string, serverId: number): Promise<ServerOwnership> {
    return this.locks.run(userId, async () => {
      const owned = await this.guard("read servers", () => this.repo.listServers(userId));
      if (owned.some((s) => s.serverName === serverName)) {
        throw new DuplicateNameError(userId, serverName);
      }
      const record: ServerOwnership = {
        userId,
        serverName,
        serverId,
        createdAt: new Date().toISOString(),
      };
      await this.guard("save server", () => this.repo.insertServer(record));
      return record;
    });
  }

  /** Exact name match first, then numeric ID, among this user's servers only. */
  async lookupServer(userId: string, nameOrId: string): Promise<ServerOwnership> {
    const query = nameOrId.trim();
    const owned = await this.listServers(userId);

    const byName = owned.find((s) => s.serverName === query);
    if (byName) return byName;

    if (/^\d+$/.test(query)) {
      const id = Number(query);
      const byId = owned.find((s) => s.serverId === id);
      if (byId) return byId;
    }

    throw new NotFoundError(`I can't find a server "${query}" under your user.`, {
      userId,
      query,
    });
  }

  listServers(userId: string): Promise<ServerOwnership[]> {
    return this.guard("read servers", () => this.repo.listServers(userId));
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ProvisionerError) throw err;
      throw new PersistenceError(`Failed to ${operation}: ${describeError(err)}`, err);
    }
  }
}
