/**
 * One-line descriptions of evaluators for logs: the class name and the settings
 * that differ from their defaults.
 */

export type SettingValue = string | number | boolean | null;

export abstract class BaseEvaluator {
  /** Current settings, keyed by option name. */
  protected settings(): Record<string, SettingValue> {
    return {};
  }

  /** The value each setting takes when its option is left out. */
  protected defaultSettings(): Record<string, SettingValue> {
    return {};
  }

  /** Settings without a default, or whose value differs from it. */
  changedSettings(): Record<string, SettingValue> {
    const defaults = this.defaultSettings();
    return Object.fromEntries(
      Object.entries(this.settings()).filter(
        ([key, value]) => !(key in defaults && defaults[key] === value),
      ),
    );
  }

  toString(): string {
    const args = Object.entries(this.changedSettings())
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(', ');
    return `${this.constructor.name}(${args})`;
  }
}
