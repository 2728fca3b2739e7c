import { MissingVariablesError } from '../shared/errors.js';

// Any non-empty `{...}` without nested braces, except shell `${NAME}`.
const PLACEHOLDER = /(?<!\$)\{([^{}]+)\}/g;

export type VariableTable = Readonly<Record<string, string | undefined>>;

/** Placeholder names in order of first appearance, each listed once. */
export function extractVariableNames(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (!names.includes(match[1])) names.push(match[1]);
  }
  return names;
}

function lookup(name: string, variables: VariableTable, envVars: VariableTable): string | undefined {
  if (Object.prototype.hasOwnProperty.call(variables, name) && variables[name] !== undefined) {
    return variables[name];
  }
  if (Object.prototype.hasOwnProperty.call(envVars, name)) return envVars[name];
  return undefined;
}

/**
 * Substitute every placeholder from `variables`, then `envVars`.
 * Throws MissingVariablesError naming all unresolved placeholders; substituted
 * values are not scanned again.
 */
export function resolveTemplate(template: string, variables: VariableTable, envVars: VariableTable): string {
  const missing = extractVariableNames(template).filter(name => lookup(name, variables, envVars) === undefined);
  if (missing.length > 0) throw new MissingVariablesError(missing);
  return template.replace(PLACEHOLDER, (_placeholder, name: string) => lookup(name, variables, envVars) ?? '');
}
