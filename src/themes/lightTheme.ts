import type { ThemeConfig } from './types';

export const lightTheme = {
  backgroundColor: '#ffffff',
  frameColor: 'rgba(0,0,0,0.35)',
  crosshairColor: 'rgba(0,0,0,0.55)',
  highlightColor: '#000000',
  textColor: '#333333',
  fontFamily:
    'system-ui, -apple-system, "Segoe UI", Roboto, Helvetica, Arial, "Apple Color Emoji", "Segoe UI Emoji"',
  fontSize: 14,
} satisfies ThemeConfig;
