import { getConfigDisplay, formatConfigDisplay } from '../lib/config-display.js';

export interface ConfigOptions {
  json?: boolean;
}

/**
 * Show current configuration (non-interactive)
 */
export async function showConfig(options: ConfigOptions = {}): Promise<void> {
  const display = getConfigDisplay();

  if (options.json) {
    console.log(JSON.stringify(display, null, 2));
  } else {
    console.log(formatConfigDisplay(display));
  }
}
