import type { InjectionConfig } from '../types/injection.js';

/** Bundled script patched by default, relative to the archive root. */
export const DEFAULT_ENTRY_PATH = 'app/mainScreen.js';

/** Splice point and markers for the Electron main-window script. */
export const DEFAULT_INJECTION_CONFIG: InjectionConfig = {
  anchor: 'mainWindow.webContents.',
  guardToken: 'CSS_INJECTION_USER_CSS',
  hostExpression: 'mainWindow.webContents',
  beginSentinel: '//JS_SCRIPT_BEGIN',
  endSentinel: '//JS_SCRIPT_END',
} as const;
