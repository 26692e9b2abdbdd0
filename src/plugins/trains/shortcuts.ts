import { InvalidCommandError } from '../../kernel/errors.js';
import type { DomainStateHandle } from '../../kernel/state-store.js';
import { TrainStateSchema } from './types.js';
import type { TrainState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// STATION SHORTCUTS — durable name → CRS map in the trains record
// ═══════════════════════════════════════════════════════════════════════════════

const NAME_PATTERN = /^[a-z][a-z0-9-]{0,31}$/;
const CRS_PATTERN = /^[A-Za-z]{3}$/;

export const TRAIN_STATE_SPEC = {
  schema: TrainStateSchema,
  defaults: (): TrainState => ({ shortcuts: {} }),
  schemaVersion: 1,
};

export class ShortcutBook {
  constructor(private readonly handle: DomainStateHandle<TrainState>) {}

  /** Startup read; persists an empty record when none exists. */
  async load(): Promise<void> {
    await this.handle.load();
  }

  async add(name: string, crs: string): Promise<{ name: string; crs: string }> {
    const key = normaliseName(name);
    if (!CRS_PATTERN.test(crs)) {
      throw new InvalidCommandError(`"${crs}" is not a 3-letter station code.`);
    }
    const code = crs.toUpperCase();

    return this.handle.update((current) => {
      if (current.shortcuts[key] === code) {
        return { state: current, result: { name: key, crs: code } };
      }
      return {
        state: { shortcuts: { ...current.shortcuts, [key]: code } },
        result: { name: key, crs: code },
      };
    });
  }

  /** @returns false when no such shortcut existed */
  async remove(name: string): Promise<boolean> {
    const key = name.trim().toLowerCase();
    return this.handle.update((current) => {
      if (!Object.hasOwn(current.shortcuts, key)) return { state: current, result: false };
      const shortcuts = { ...current.shortcuts };
      delete shortcuts[key];
      return { state: { shortcuts }, result: true };
    });
  }

  async list(): Promise<Array<{ name: string; crs: string }>> {
    const { shortcuts } = await this.handle.read();
    return Object.entries(shortcuts)
      .map(([name, crs]) => ({ name, crs }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Shortcut name (case-insensitive) or a bare 3-letter code.
   * @throws InvalidCommandError for anything else
   */
  async resolve(station: string): Promise<string> {
    const text = station.trim();
    const { shortcuts } = await this.handle.read();
    const key = text.toLowerCase();
    if (Object.hasOwn(shortcuts, key)) return shortcuts[key];
    if (CRS_PATTERN.test(text)) return text.toUpperCase();
    throw new InvalidCommandError(`Unknown station "${text}". Use a 3-letter code or add a shortcut.`);
  }
}

function normaliseName(name: string): string {
  const key = name.trim().toLowerCase();
  if (!NAME_PATTERN.test(key)) {
    throw new InvalidCommandError('Shortcut names are letters, digits or dashes, starting with a letter.');
  }
  return key;
}
