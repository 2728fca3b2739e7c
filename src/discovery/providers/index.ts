import type { CommandProvider } from '../types.js';
import { cargoProvider } from './cargo.js';
import { composeProvider } from './compose.js';
import { makefileProvider } from './makefile.js';
import { packageScriptsProvider } from './package-scripts.js';
import { scriptsProvider } from './scripts.js';

export { cargoProvider, composeProvider, makefileProvider, packageScriptsProvider, scriptsProvider };

/** Built-in providers in the order their commands are listed. */
export function defaultProviders(): CommandProvider[] {
  return [packageScriptsProvider, makefileProvider, scriptsProvider, composeProvider, cargoProvider];
}
