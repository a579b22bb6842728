// Voice Command Relay - Trigger Configuration
// Owners and their wake words, read from a JSON file and reloaded when it changes.
//
// File format (config/triggers.json):
//   { "owners": [ { "id": "claude", "name": "Claude", "wakeWords": ["Claude", "클로드"],
//                   "enabled": true, "autoSubmit": true } ] }
// `name` defaults to `id`, `wakeWords` to `[name]`, `enabled` and `autoSubmit` to true.

import { readFile } from "node:fs/promises";
import { watch, type FSWatcher } from "node:fs";
import type { TriggerOwner, TriggerPhrase } from "./types.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { toErrorMessage } from "./errors.js";

export interface TriggerConfigProvider {
  /** Phrases of every enabled owner, in file order. */
  getTriggers(): TriggerPhrase[];
  getOwner(id: string): TriggerOwner | undefined;
}

export interface ParsedTriggerConfig {
  owners: TriggerOwner[];
  /** One message per skipped owner entry. */
  errors: string[];
}

// ─── Parsing ────────────────────────────────────────────────────────────────────

function field(entry: object, key: string): unknown {
  return Reflect.get(entry, key);
}

/**
 * Validates a parsed triggers file. Malformed owner entries are skipped and
 * reported in `errors`; a document without an `owners` array throws.
 */
export function parseTriggerConfig(data: unknown): ParsedTriggerConfig {
  if (typeof data !== "object" || data === null) {
    throw new Error("Trigger configuration must be a JSON object");
  }
  const list = field(data, "owners");
  if (!Array.isArray(list)) {
    throw new Error('Trigger configuration needs an "owners" array');
  }

  const owners: TriggerOwner[] = [];
  const errors: string[] = [];
  const seen = new Set<string>();

  list.forEach((entry: unknown, index: number) => {
    const where = `owners[${index}]`;
    if (typeof entry !== "object" || entry === null) {
      errors.push(`${where}: must be an object`);
      return;
    }

    const id = field(entry, "id");
    if (typeof id !== "string" || !id.trim()) {
      errors.push(`${where}: "id" must be a non-empty string`);
      return;
    }
    if (seen.has(id)) {
      errors.push(`${where}: duplicate id "${id}"`);
      return;
    }

    const name = field(entry, "name") ?? id;
    if (typeof name !== "string") {
      errors.push(`${where}: "name" must be a string`);
      return;
    }

    const wakeWords = field(entry, "wakeWords") ?? [name];
    if (!Array.isArray(wakeWords) || !wakeWords.every((w: unknown) => typeof w === "string")) {
      errors.push(`${where}: "wakeWords" must be an array of strings`);
      return;
    }

    const enabled = field(entry, "enabled") ?? true;
    const autoSubmit = field(entry, "autoSubmit") ?? true;
    if (typeof enabled !== "boolean" || typeof autoSubmit !== "boolean") {
      errors.push(`${where}: "enabled" and "autoSubmit" must be booleans`);
      return;
    }

    seen.add(id);
    owners.push({
      id,
      name,
      wakeWords: wakeWords.filter((w): w is string => typeof w === "string"),
      enabled,
      autoSubmit,
    });
  });

  return { owners, errors };
}

/** Flattens enabled owners into trigger phrases, one per wake word. */
export function ownersToTriggers(owners: readonly TriggerOwner[]): TriggerPhrase[] {
  return owners
    .filter((owner) => owner.enabled)
    .flatMap((owner) => owner.wakeWords.map((phrase) => ({ phrase, owner: owner.id })));
}

// ─── In-memory provider ─────────────────────────────────────────────────────────

export class StaticTriggerConfig implements TriggerConfigProvider {
  protected owners: TriggerOwner[];
  private triggers: TriggerPhrase[];

  constructor(owners: TriggerOwner[] = []) {
    this.owners = owners;
    this.triggers = ownersToTriggers(owners);
  }

  getTriggers(): TriggerPhrase[] {
    return this.triggers;
  }

  getOwner(id: string): TriggerOwner | undefined {
    return this.owners.find((owner) => owner.id === id);
  }

  getOwners(): TriggerOwner[] {
    return this.owners;
  }

  setOwners(owners: TriggerOwner[]): void {
    this.owners = owners;
    this.triggers = ownersToTriggers(owners);
  }
}

// ─── File-backed provider ───────────────────────────────────────────────────────

/** Editors save in bursts; reload once the burst is over. */
const RELOAD_DEBOUNCE_MS = 100;

export class FileTriggerConfig extends StaticTriggerConfig {
  private readonly path: string;
  private readonly logger: Logger;
  private watcher: FSWatcher | null = null;
  private reloadTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(path: string, logger: Logger = silentLogger) {
    super();
    this.path = path;
    this.logger = logger;
  }

  /**
   * Reads the file and replaces the owners. Skipped entries are logged.
   * @throws when the file is missing, is not JSON or has no owners array.
   */
  async load(): Promise<TriggerOwner[]> {
    const raw = await readFile(this.path, "utf-8");
    const { owners, errors } = parseTriggerConfig(JSON.parse(raw));
    for (const message of errors) {
      this.logger.warn(`${this.path}: ${message}`);
    }

    this.setOwners(owners);
    const phrases = this.getTriggers().length;
    this.logger.info(`Loaded ${owners.length} trigger owner(s), ${phrases} phrase(s) from ${this.path}`);
    return owners;
  }

  /** Like load(), but a broken file keeps the previous owners. Returns whether the reload applied. */
  async reload(): Promise<boolean> {
    try {
      await this.load();
      return true;
    } catch (err) {
      this.logger.error(`Keeping previous trigger configuration, reload of ${this.path} failed: ${toErrorMessage(err)}`);
      return false;
    }
  }

  /** Reloads whenever the file changes until close(). */
  watch(): void {
    if (this.watcher) return;

    this.watcher = watch(this.path, () => {
      if (this.reloadTimer) clearTimeout(this.reloadTimer);
      this.reloadTimer = setTimeout(() => {
        this.reloadTimer = null;
        this.reload().catch((err: unknown) => {
          this.logger.error(`Trigger reload failed: ${toErrorMessage(err)}`);
        });
      }, RELOAD_DEBOUNCE_MS);
    });
    this.watcher.on("error", (err) => {
      this.logger.warn(`Watching ${this.path} failed: ${err.message}`);
    });
  }

  close(): void {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
      this.reloadTimer = null;
    }
    this.watcher?.close();
    this.watcher = null;
  }
}
