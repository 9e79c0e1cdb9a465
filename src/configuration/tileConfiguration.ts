// tileConfiguration.ts — gap and animation settings for the tiling layer
//
// Values arrive already parsed (from a settings file or IPC) through
// `load()` or `update()`. Each key has a registered schema with a default;
// invalid writes are rejected with a warning and the previous value stays.

import { Disposable } from '../platform/lifecycle.js';
import { Emitter, type Event } from '../platform/events.js';
import type { GapSpec } from '../tile/tileTypes.js';

// ─── Keys & Schema ───────────────────────────────────────────────────────────

export const TileSettings = {
  InnerGapSize: 'tile.innerGapSize',
  OuterHorizontalGapSize: 'tile.outerHorizontalGapSize',
  OuterVerticalGapSize: 'tile.outerVerticalGapSize',
  AnimationDuration: 'tile.animationDuration',
} as const;

export type TileSettingKey = (typeof TileSettings)[keyof typeof TileSettings];

export interface ITileSettingSchema {
  readonly key: TileSettingKey;
  readonly defaultValue: number;
  /** Smallest accepted value (inclusive). */
  readonly minimum: number;
  readonly description: string;
}

export const TILE_CONFIGURATION_SCHEMA: readonly ITileSettingSchema[] = [
  {
    key: TileSettings.InnerGapSize,
    defaultValue: 5,
    minimum: 0,
    description: 'Spacing between adjacent tiles, in pixels.',
  },
  {
    key: TileSettings.OuterHorizontalGapSize,
    defaultValue: 10,
    minimum: 0,
    description: 'Padding at the left and right edges of the workspace.',
  },
  {
    key: TileSettings.OuterVerticalGapSize,
    defaultValue: 10,
    minimum: 0,
    description: 'Padding at the top and bottom edges of the workspace.',
  },
  {
    key: TileSettings.AnimationDuration,
    defaultValue: 150,
    minimum: 0,
    description: 'Duration of the resize crossfade in milliseconds. 0 disables it.',
  },
];

const SCHEMA_BY_KEY = new Map<string, ITileSettingSchema>(
  TILE_CONFIGURATION_SCHEMA.map((schema) => [schema.key, schema]),
);

function isTileSettingKey(key: string): key is TileSettingKey {
  return SCHEMA_BY_KEY.has(key);
}

function isAcceptedValue(key: TileSettingKey, value: unknown): value is number {
  const schema = SCHEMA_BY_KEY.get(key);
  return (
    schema !== undefined &&
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= schema.minimum
  );
}

// ─── Change Event ────────────────────────────────────────────────────────────

export interface ITileConfigurationChangeEvent {
  /** Whether `section` (a key or a dotted prefix such as `'tile'`) changed. */
  affectsConfiguration(section: string): boolean;
  readonly affectedKeys: readonly TileSettingKey[];
}

function createChangeEvent(affectedKeys: readonly TileSettingKey[]): ITileConfigurationChangeEvent {
  return {
    affectedKeys,
    affectsConfiguration: (section: string) =>
      affectedKeys.some((k) => k === section || k.startsWith(section + '.')),
  };
}

// ─── TileConfiguration ───────────────────────────────────────────────────────

export class TileConfiguration extends Disposable {
  /** Explicit (non-default) values. */
  private readonly _values = new Map<TileSettingKey, number>();

  private readonly _onDidChangeConfiguration = this._register(new Emitter<ITileConfigurationChangeEvent>());
  readonly onDidChangeConfiguration: Event<ITileConfigurationChangeEvent> = this._onDidChangeConfiguration.event;

  constructor(initial: Readonly<Record<string, unknown>> = {}) {
    super();
    this._apply(initial);
  }

  get(key: TileSettingKey): number {
    return this._values.get(key) ?? this.getDefault(key);
  }

  getDefault(key: TileSettingKey): number {
    const schema = SCHEMA_BY_KEY.get(key);
    return schema ? schema.defaultValue : 0;
  }

  /**
   * Check a value against the key's schema.
   * @returns `true`, or a message describing why the value is rejected.
   */
  validateValue(key: string, value: unknown): true | string {
    const schema = SCHEMA_BY_KEY.get(key);
    if (!schema) {
      return `Unknown setting "${key}"`;
    }
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      return `Setting "${key}" expects an integer, got ${JSON.stringify(value)}`;
    }
    if (!isAcceptedValue(schema.key, value)) {
      return `Setting "${key}" must be at least ${schema.minimum}, got ${value}`;
    }
    return true;
  }

  /**
   * Write one value. `undefined` resets the key to its default.
   * @returns Whether the value was accepted.
   */
  update(key: string, value: unknown): boolean {
    return this._apply({ [key]: value });
  }

  /**
   * Write several values at once; listeners are notified once.
   */
  load(values: Readonly<Record<string, unknown>>): void {
    this._apply(values);
  }

  // ── Derived values ──

  get animationDuration(): number {
    return this.get(TileSettings.AnimationDuration);
  }

  /**
   * Gaps for a workspace root: horizontal outer gaps on the left and right,
   * vertical outer gaps on the top and bottom, the inner gap between tiles.
   */
  getGaps(): GapSpec {
    const horizontal = this.get(TileSettings.OuterHorizontalGapSize);
    const vertical = this.get(TileSettings.OuterVerticalGapSize);
    return {
      left: horizontal,
      right: horizontal,
      top: vertical,
      bottom: vertical,
      internal: this.get(TileSettings.InnerGapSize),
    };
  }

  private _apply(values: Readonly<Record<string, unknown>>): boolean {
    const changed: TileSettingKey[] = [];
    let accepted = true;

    for (const [key, value] of Object.entries(values)) {
      if (!isTileSettingKey(key)) {
        console.warn(`[TileConfiguration] Unknown setting "${key}"`);
        accepted = false;
        continue;
      }

      if (value === undefined) {
        if (this._values.delete(key)) {
          changed.push(key);
        }
        continue;
      }

      if (!isAcceptedValue(key, value)) {
        console.warn(`[TileConfiguration] ${this.validateValue(key, value)}`);
        accepted = false;
        continue;
      }

      if (this.get(key) !== value) {
        changed.push(key);
      }
      this._values.set(key, value);
    }

    if (changed.length > 0) {
      this._onDidChangeConfiguration.fire(createChangeEvent(changed));
    }
    return accepted;
  }
}
