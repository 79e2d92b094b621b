import { readFileSync, writeFileSync } from 'fs';
import {
  EDGE_PLACEHOLDERS,
  EDGE_PLACEHOLDER_KEYS,
  type EdgeDeployValues,
  type EdgePlaceholderKey,
} from '@lit-up/shared';
import type { DeployConfig } from '../config/index.js';

/**
 * Placeholder tokens present in a bundle
 */
export function findPlaceholders(code: string): EdgePlaceholderKey[] {
  return EDGE_PLACEHOLDER_KEYS.filter((key) => code.includes(EDGE_PLACEHOLDERS[key]));
}

export function deployValuesFrom(config: DeployConfig): EdgeDeployValues {
  return {
    authUsernameParam: config.parameterNames.authUsername,
    authPasswordParam: config.parameterNames.authPassword,
    activeVersionsParam: config.parameterNames.activeVersions,
    region: config.region,
  };
}

/**
 * Replace every placeholder token in the bundle source
 * @throws Error if a value is empty or the bundle has no placeholders left to fill
 */
export function injectEdgeValues(code: string, values: EdgeDeployValues): string {
  const present = findPlaceholders(code);
  if (present.length === 0) {
    throw new Error('No placeholders found; the bundle may already be injected');
  }

  let result = code;
  for (const key of present) {
    const value = values[key];
    if (!value.trim()) {
      throw new Error(`Missing value for ${EDGE_PLACEHOLDERS[key]}`);
    }
    result = result.replaceAll(EDGE_PLACEHOLDERS[key], () => value);
  }

  return result;
}

/**
 * Inject deploy values into a built edge bundle on disk
 * @returns the path written
 */
export function injectBundleFile(bundlePath: string, values: EdgeDeployValues, outPath?: string): string {
  const code = readFileSync(bundlePath, 'utf-8');
  const injected = injectEdgeValues(code, values);
  const target = outPath ?? bundlePath;
  writeFileSync(target, injected);
  return target;
}
