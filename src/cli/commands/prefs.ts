// src/cli/commands/prefs.ts
import { Command } from 'commander';
import { APP_NAME, CONTAINER_CHOICES, RESOLUTION_CHOICES } from '../../core/config/constants.js';
import { getPreferencesPath } from '../../core/config/app-dirs.js';
import { PreferenceStore } from '../../core/config/preferences.js';

export function describePreferences(store: PreferenceStore, prefs = store.get()): string[] {
  return [
    `File:           ${store.path}`,
    `Output folder:  ${prefs.outputDir}`,
    `Max resolution: ${RESOLUTION_CHOICES[prefs.maxResIndex]}`,
    `Format:         ${CONTAINER_CHOICES[prefs.formatIndex]}`,
  ];
}

export function registerPrefsCommand(
  program: Command,
  createStore: () => PreferenceStore = () => new PreferenceStore(getPreferencesPath(APP_NAME))
): void {
  const prefsCmd = program
    .command('prefs')
    .description('Saved preferences');

  prefsCmd
    .command('show')
    .description('Print saved preferences')
    .action(async () => {
      const store = createStore();
      await store.load();
      describePreferences(store).forEach((line) => console.log(line));
    });

  prefsCmd
    .command('reset')
    .description('Restore default preferences')
    .action(async () => {
      const store = createStore();
      try {
        await store.reset();
        console.log('✓ Preferences reset');
      } catch (error) {
        console.error('✗ Failed to reset preferences:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
