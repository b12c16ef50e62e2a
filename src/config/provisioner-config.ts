import { SecretsManager } from 'aws-sdk';

/**
 * Connection settings for the GoodData instance
 */
export interface GoodDataConfig {
  host: string;
  token: string;
  timeoutMs: number;
}

/**
 * Settings GoodData uses to reach Snowflake when a data source is created
 */
export interface SnowflakeConfig {
  user: string;
  role: string;
  password: string;
  account: string;
  warehouse: string;
  port: number;
}

export interface ProvisionerConfig {
  gooddata: GoodDataConfig;
  snowflake: SnowflakeConfig;
}

export type Environment = Record<string, string | undefined>;

/**
 * Resolves a secret id to its value
 */
export type SecretResolver = (secretId: string) => Promise<string>;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_SNOWFLAKE_PORT = 443;

/**
 * Error thrown when the environment does not describe a usable configuration
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly variables: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Reads secret strings from AWS Secrets Manager
 */
export function createSecretsManagerResolver(env: Environment = process.env): SecretResolver {
  const secretsManager = new SecretsManager({
    region: env.AWS_REGION || 'us-east-1',
    ...(env.SECRETS_MANAGER_ENDPOINT && {
      endpoint: env.SECRETS_MANAGER_ENDPOINT
    })
  });

  return async (secretId: string): Promise<string> => {
    const response = await secretsManager.getSecretValue({ SecretId: secretId }).promise();
    if (response.SecretString === undefined) {
      throw new ConfigurationError(`Secret ${secretId} has no string value`);
    }
    return response.SecretString;
  };
}

function parsePositiveInteger(env: Environment, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer but is "${raw}"`, [name]);
  }
  return value;
}

/**
 * Loads the provisioner configuration from environment variables.
 *
 * `GOODDATA_TOKEN` and `SNOWFLAKE_PASSWORD` may be replaced by
 * `GOODDATA_TOKEN_SECRET_ID` and `SNOWFLAKE_PASSWORD_SECRET_ID`, which are
 * looked up with `resolveSecret`. A plain value wins over a secret id.
 *
 * @throws ConfigurationError naming every missing variable
 */
export async function loadProvisionerConfig(
  env: Environment = process.env,
  resolveSecret?: SecretResolver
): Promise<ProvisionerConfig> {
  const missing: string[] = [];
  const required = (name: string): string => {
    const value = env[name];
    if (value === undefined || value === '') {
      missing.push(name);
      return '';
    }
    return value;
  };
  const secret = (name: string): string | { secretId: string } => {
    const value = env[name];
    if (value !== undefined && value !== '') {
      return value;
    }
    const secretId = env[`${name}_SECRET_ID`];
    if (secretId !== undefined && secretId !== '') {
      return { secretId };
    }
    missing.push(name);
    return '';
  };

  const host = required('GOODDATA_HOST');
  const token = secret('GOODDATA_TOKEN');
  const user = required('SNOWFLAKE_USER');
  const role = required('SNOWFLAKE_ROLE');
  const password = secret('SNOWFLAKE_PASSWORD');
  const account = required('SNOWFLAKE_ORGANIZATION_ACCOUNT');
  const warehouse = required('SNOWFLAKE_WAREHOUSE');

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`, missing);
  }

  const timeoutMs = parsePositiveInteger(env, 'GOODDATA_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS);
  const port = parsePositiveInteger(env, 'SNOWFLAKE_PORT', DEFAULT_SNOWFLAKE_PORT);

  const needsSecrets = typeof token !== 'string' || typeof password !== 'string';
  const resolver = needsSecrets ? resolveSecret ?? createSecretsManagerResolver(env) : undefined;
  const reveal = async (value: string | { secretId: string }): Promise<string> => {
    if (typeof value === 'string') {
      return value;
    }
    if (!resolver) {
      throw new ConfigurationError(`No secret resolver available for ${value.secretId}`);
    }
    return resolver(value.secretId);
  };

  return {
    gooddata: {
      host,
      token: await reveal(token),
      timeoutMs
    },
    snowflake: {
      user,
      role,
      password: await reveal(password),
      account,
      warehouse,
      port
    }
  };
}
