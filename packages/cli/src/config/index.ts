import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { EDGE, type EdgeParameterNames } from '@lit-up/shared';

export const DEFAULT_PROJECT = 'lit-up';
export const DEFAULT_STAGE = 'dev';
export const CONFIG_FILE_NAME = 'lit-up.config.json';

/**
 * Resolved deploy configuration for the edge function
 */
export interface DeployConfig {
  project: string;
  stage: string;
  region: string;
  parameterNames: EdgeParameterNames;
}

/**
 * Shape of lit-up.config.json (every field optional)
 */
export interface DeployConfigFile {
  project?: string;
  stage?: string;
  region?: string;
  parameterNames?: Partial<EdgeParameterNames>;
}

export interface LoadDeployConfigOptions {
  stage?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

/**
 * Type guard for the config file contents
 */
export function isDeployConfigFile(data: unknown): data is DeployConfigFile {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return false;
  const file = data as Record<string, unknown>;

  if (!isOptionalString(file.project) || !isOptionalString(file.stage) || !isOptionalString(file.region)) {
    return false;
  }

  if (file.parameterNames === undefined) return true;
  if (typeof file.parameterNames !== 'object' || file.parameterNames === null) return false;
  const names = file.parameterNames as Record<string, unknown>;
  return (
    isOptionalString(names.authUsername) &&
    isOptionalString(names.authPassword) &&
    isOptionalString(names.activeVersions)
  );
}

/**
 * Conventional parameter names, namespaced by project and stage
 */
export function defaultParameterNames(project: string, stage: string): EdgeParameterNames {
  const prefix = `/${project}/${stage}`;
  return {
    authUsername: `${prefix}/auth-username`,
    authPassword: `${prefix}/auth-password`,
    activeVersions: `${prefix}/active-versions`,
  };
}

/**
 * Read lit-up.config.json from a directory, if present
 */
function readConfigFile(cwd: string): DeployConfigFile {
  const configPath = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (!isDeployConfigFile(parsed)) {
      console.warn(`Ignoring ${CONFIG_FILE_NAME}: unexpected structure`);
      return {};
    }
    return parsed;
  } catch (error) {
    console.warn(`Failed to load ${CONFIG_FILE_NAME}:`, error);
    return {};
  }
}

/**
 * Load deploy configuration.
 * Precedence: explicit stage option > environment > config file > defaults.
 */
export function loadDeployConfig(options: LoadDeployConfigOptions = {}): DeployConfig {
  const env = options.env ?? process.env;
  const file = readConfigFile(options.cwd ?? process.cwd());

  const project = file.project || DEFAULT_PROJECT;
  const stage = options.stage || env.LIT_UP_STAGE || file.stage || DEFAULT_STAGE;
  const defaults = defaultParameterNames(project, stage);

  return {
    project,
    stage,
    region: env.LIT_UP_REGION || file.region || EDGE.DEFAULT_REGION,
    parameterNames: {
      authUsername:
        env.LIT_UP_AUTH_USERNAME_PARAM || file.parameterNames?.authUsername || defaults.authUsername,
      authPassword:
        env.LIT_UP_AUTH_PASSWORD_PARAM || file.parameterNames?.authPassword || defaults.authPassword,
      activeVersions:
        env.LIT_UP_ACTIVE_VERSIONS_PARAM || file.parameterNames?.activeVersions || defaults.activeVersions,
    },
  };
}
