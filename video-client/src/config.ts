import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_API_VERSION = 'preview';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const schema = z.object({
  endpoint: z
    .string({ required_error: 'Azure OpenAI endpoint is required' })
    .url()
    .transform((value) => (value.endsWith('/') ? value : `${value}/`)),
  apiKey: z.string({ required_error: 'Azure OpenAI API key is required' }).min(1, 'Azure OpenAI API key is required'),
  deploymentName: z
    .string({ required_error: 'Azure OpenAI deployment name is required' })
    .min(1, 'Azure OpenAI deployment name is required'),
  apiVersion: z.string().min(1).default(DEFAULT_API_VERSION),
  requestTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS)
});

export type ClientConfig = z.infer<typeof schema>;

export type ClientConfigInput = Partial<{
  endpoint: string;
  apiKey: string;
  deploymentName: string;
  apiVersion: string;
  requestTimeoutMs: number;
}>;

function pick(explicit: string | undefined, fromEnv: string | undefined): string | undefined {
  if (explicit !== undefined && explicit.length > 0) return explicit;
  if (fromEnv !== undefined && fromEnv.length > 0) return fromEnv;
  return undefined;
}

/**
 * Resolves the client configuration. Explicit values win over the
 * environment; anything still missing without a default is an error.
 */
export function resolveClientConfig(
  input: ClientConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const result = schema.safeParse({
    endpoint: pick(input.endpoint, env.AZURE_OPENAI_ENDPOINT),
    apiKey: pick(input.apiKey, env.AZURE_OPENAI_API_KEY),
    deploymentName: pick(input.deploymentName, env.AZURE_OPENAI_DEPLOYMENT_NAME),
    apiVersion: pick(input.apiVersion, env.AZURE_OPENAI_API_VERSION),
    requestTimeoutMs: input.requestTimeoutMs ?? (env.AZURE_OPENAI_REQUEST_TIMEOUT_MS || undefined)
  });

  if (!result.success) {
    throw new ConfigurationError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }
  return result.data;
}

/**
 * Loads the first .env file found next to, or above, the working directory.
 * Returns the path that was loaded.
 */
export function loadEnvFiles(cwd: string = process.cwd()): string | undefined {
  const envPaths = [
    resolve(cwd, '../.env'),
    resolve(cwd, '../../.env'),
    resolve(cwd, '.env')
  ];

  for (const envPath of envPaths) {
    const result = loadEnv({ path: envPath });
    if (!result.error) {
      return envPath;
    }
  }
  return undefined;
}
