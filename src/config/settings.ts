/**
 * Settings Manager
 *
 * Viewer configuration in a flat settings.json-style map of dotted keys.
 */

export interface ViewerSettings {
  'viewer.tableWidth': number;
  'viewer.minPaneWidth': number;
  'viewer.scrollWheelLines': number;
  'viewer.resizeModeTimeout': number;
  'viewer.messageMaxLength': number;
  'viewer.confirmExit': boolean;
  'workbench.colorCustomizations': Record<string, string>;
}

export type SettingKey = keyof ViewerSettings;

export const defaultSettings: ViewerSettings = {
  'viewer.tableWidth': 74,
  'viewer.minPaneWidth': 40,
  'viewer.scrollWheelLines': 3,
  'viewer.resizeModeTimeout': 2000,
  'viewer.messageMaxLength': 100,
  'viewer.confirmExit': true,
  'workbench.colorCustomizations': {},
};

type SettingListener = (value: ViewerSettings[SettingKey]) => void;

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(defaultSettings, key);
}

/**
 * Check a value against the type of the key's default.
 */
export function isValidSettingValue<K extends SettingKey>(
  key: K,
  value: unknown
): value is ViewerSettings[K] {
  const fallback = defaultSettings[key];
  if (typeof fallback === 'number') {
    return typeof value === 'number' && Number.isFinite(value);
  }
  if (typeof fallback === 'boolean') {
    return typeof value === 'boolean';
  }
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v: unknown) => typeof v === 'string')
  );
}

export class Settings {
  private settings: ViewerSettings;
  private listeners: Map<SettingKey, Set<SettingListener>> = new Map();

  constructor(initial: Partial<ViewerSettings> = {}) {
    this.settings = { ...defaultSettings, ...initial };
  }

  /**
   * Get a setting value
   */
  get<K extends SettingKey>(key: K): ViewerSettings[K] {
    return this.settings[key];
  }

  /**
   * Set a setting value
   */
  set<K extends SettingKey>(key: K, value: ViewerSettings[K]): void {
    const oldValue = this.settings[key];
    this.settings[key] = value;

    if (oldValue !== value) {
      this.notifyListeners(key, value);
    }
  }

  /**
   * Get all settings
   */
  getAll(): ViewerSettings {
    return { ...this.settings };
  }

  /**
   * Apply every known, well-typed entry of a raw settings object.
   * Returns the keys that were rejected.
   */
  update(partial: Record<string, unknown>): string[] {
    const rejected: string[] = [];
    for (const [key, value] of Object.entries(partial)) {
      if (value === undefined) continue;
      if (!isSettingKey(key) || !this.applyUnknown(key, value)) {
        rejected.push(key);
      }
    }
    return rejected;
  }

  private applyUnknown<K extends SettingKey>(key: K, value: unknown): boolean {
    if (!isValidSettingValue(key, value)) return false;
    this.set(key, value);
    return true;
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.settings = { ...defaultSettings };
    for (const key of Object.keys(this.settings)) {
      if (isSettingKey(key)) {
        this.notifyListeners(key, this.settings[key]);
      }
    }
  }

  /**
   * Listen for changes to a specific setting
   */
  onChange<K extends SettingKey>(key: K, callback: (value: ViewerSettings[K]) => void): () => void {
    const listener: SettingListener = () => callback(this.settings[key]);
    let keyListeners = this.listeners.get(key);
    if (!keyListeners) {
      keyListeners = new Set();
      this.listeners.set(key, keyListeners);
    }
    keyListeners.add(listener);

    return () => {
      this.listeners.get(key)?.delete(listener);
    };
  }

  /**
   * Theme colour override, or the fallback.
   */
  getColor(key: string, fallback: string): string {
    return this.settings['workbench.colorCustomizations'][key] ?? fallback;
  }

  private notifyListeners(key: SettingKey, value: ViewerSettings[SettingKey]): void {
    const keyListeners = this.listeners.get(key);
    if (keyListeners) {
      for (const listener of keyListeners) {
        listener(value);
      }
    }
  }
}
