/**
 * Theme system for the Marquee TUI.
 *
 * @module ui/theme
 *
 * @example
 * ```ts
 * import { colors, getStateColor } from '../theme/index.js';
 *
 * <Text color={colors.primary}>Hello</Text>
 * <Text color={getStateColor(state)}>{state}</Text>
 * ```
 */

export {
  colors,
  getStateColor,
  getProgressColor,
  getSpeedColor,
  type Color,
} from './colors.js';

export { borders, progressChars, symbols } from './styles.js';
