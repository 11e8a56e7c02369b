/**
 * Configuration
 *
 * Option objects accepted by the codec and adapter factories.
 */

export type CivilConfig = {
  /**
   * Range-check every field at encode time, not only the Date year.
   * Decoding is always strict.
   */
  strict?: boolean
}

export const DEFAULT_CONFIG: Readonly<Required<CivilConfig>> = {
  strict: false,
}

export function resolveConfig(config: CivilConfig = {}): Readonly<Required<CivilConfig>> {
  return { ...DEFAULT_CONFIG, ...config }
}
