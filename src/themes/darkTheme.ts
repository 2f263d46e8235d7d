import type { ThemeConfig } from './types';

export const darkTheme = {
  backgroundColor: '#0a0a0a',
  frameColor: '#787878',
  crosshairColor: '#787878',
  highlightColor: '#ffffff',
  textColor: '#ffffff',
  fontFamily:
    'system-ui, -apple-system, "Segoe UI", Roboto, Helvetica, Arial, "Apple Color Emoji", "Segoe UI Emoji"',
  fontSize: 14,
} satisfies ThemeConfig;
