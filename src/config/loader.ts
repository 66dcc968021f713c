import * as fs from 'fs';
import * as YAML from 'yaml';
import { JsonTranscoder } from '../codec/json.js';
import { MsgPackTranscoder } from '../codec/msgpack.js';
import { ContentRegistry, addTranscoder, createDefaultRegistry } from '../codec/registry.js';
import type { ContentLogger } from '../codec/types.js';

export const CONTENT_CONFIG_VERSION = 'mediakit/v1';

export type CodecName = 'json' | 'msgpack';

export interface ContentTypeEntry {
  contentType: string;
  codec: CodecName;
  encoding?: string;
}

export interface ContentConfig {
  version: string;
  default?: { contentType?: string; encoding?: string };
  types: ContentTypeEntry[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(source: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new Error(`${where}: ${key} must be a string`);
  return value;
}

function isCodecName(value: unknown): value is CodecName {
  return value === 'json' || value === 'msgpack';
}

export class ContentConfigLoader {
  load(path: string): ContentConfig {
    const content = fs.readFileSync(path, 'utf8');
    return this.parse(content);
  }

  parse(content: string): ContentConfig {
    const raw: unknown = YAML.parse(content);
    if (!isRecord(raw)) {
      throw new Error('Content config must be a mapping');
    }
    return this.validate(raw);
  }

  private validate(raw: Record<string, unknown>): ContentConfig {
    const version = optionalString(raw, 'version', 'Content config');
    if (!version) {
      throw new Error('Content config missing required field: version');
    }

    if (version !== CONTENT_CONFIG_VERSION) {
      throw new Error(`Unsupported content config version: ${version}`);
    }

    if (!Array.isArray(raw.types)) {
      throw new Error('Content config missing required field: types (must be array)');
    }

    const config: ContentConfig = {
      version,
      types: raw.types.map((entry: unknown, index: number) => this.validateEntry(entry, index))
    };

    if (raw.default !== undefined && raw.default !== null) {
      if (!isRecord(raw.default)) throw new Error('Content config: default must be a mapping');
      config.default = {
        contentType: optionalString(raw.default, 'contentType', 'default'),
        encoding: optionalString(raw.default, 'encoding', 'default')
      };
    }

    return config;
  }

  private validateEntry(entry: unknown, index: number): ContentTypeEntry {
    if (!isRecord(entry)) {
      throw new Error(`Type entry ${index} must be a mapping`);
    }

    const contentType = optionalString(entry, 'contentType', `Type entry ${index}`);
    if (!contentType) {
      throw new Error(`Type entry ${index} missing required field: contentType`);
    }

    if (!isCodecName(entry.codec)) {
      throw new Error(`Type ${contentType}: invalid codec ${String(entry.codec)}`);
    }

    const encoding = optionalString(entry, 'encoding', `Type ${contentType}`);
    if (encoding && entry.codec === 'msgpack') {
      throw new Error(`Type ${contentType}: encoding does not apply to binary codec msgpack`);
    }

    return { contentType, codec: entry.codec, encoding };
  }
}

export function loadContentConfig(path: string): ContentConfig {
  const loader = new ContentConfigLoader();
  return loader.load(path);
}

export interface BuildRegistryOptions {
  logger?: ContentLogger;
  env?: NodeJS.ProcessEnv;
}

/** Registers the configured types in file order, then applies env overrides to the default. */
export function buildRegistry(config: ContentConfig, options: BuildRegistryOptions = {}): ContentRegistry {
  const env = options.env ?? process.env;
  const registry = new ContentRegistry({ logger: options.logger });
  registry.setDefault(config.default?.contentType, config.default?.encoding);
  applyEnvDefaults(registry, env);
  // a text type without its own encoding takes the registry default
  for (const entry of config.types) {
    const transcoder =
      entry.codec === 'msgpack'
        ? new MsgPackTranscoder({ contentType: entry.contentType })
        : new JsonTranscoder({ contentType: entry.contentType, defaultEncoding: entry.encoding ?? registry.defaultEncoding });
    addTranscoder(registry, transcoder);
  }
  return registry;
}

export function applyEnvDefaults(registry: ContentRegistry, env: NodeJS.ProcessEnv): void {
  registry.setDefault(env.MEDIAKIT_DEFAULT_CONTENT_TYPE || undefined, env.MEDIAKIT_DEFAULT_ENCODING || undefined);
}

/** Registry for the process: from `MEDIAKIT_CONTENT_CONFIG` when set, the default registry otherwise. */
export function registryFromEnv(env: NodeJS.ProcessEnv = process.env, logger?: ContentLogger): ContentRegistry {
  const path = env.MEDIAKIT_CONTENT_CONFIG;
  if (path) {
    (logger ?? console).log(`[Content] Loading content config from ${path}`);
    return buildRegistry(loadContentConfig(path), { logger, env });
  }
  const registry = createDefaultRegistry({ logger, defaultEncoding: env.MEDIAKIT_DEFAULT_ENCODING || undefined });
  applyEnvDefaults(registry, env);
  return registry;
}
