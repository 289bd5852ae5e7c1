import path from 'node:path';
import { startMcpServer } from '@paperqa/tools-adaptor-mcp';
import { LogLevel, createLogger, parseLogLevel, setLogLevel } from '@paperqa/tools-core';
import {
  ChatModelProvider,
  DEFAULT_CACHE_DIR,
  DEFAULT_COMPATIBLE_BASE_URL,
  DEFAULT_EMBEDDING_DIMENSION,
  EmbeddingModelProvider,
  FsCacheStore,
  InvalidConfigError,
  PaperQaSession,
  type RagConfig,
  type RagConfigInput,
  RagPipeline,
  parseRagConfig,
  ragTools,
} from '@paperqa/tools-rag';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import yargs from 'yargs';
import packageInfo from '../package.json' with { type: 'json' };

const log = createLogger('server');

export const API_KEY_ENV = 'DASHSCOPE_API_KEY';

export interface ServerConfig {
  workspaceRoot: string;
  allowOutsideWorkspace: boolean;
  /** Absolute cache directory. */
  cacheDir: string;
  logLevel: LogLevel;
  rag: RagConfig;
}

/**
 * Builds the server configuration from command-line flags. Every flag can also be given as a
 * `PAPERQA_*` environment variable (e.g. PAPERQA_CHUNK_SIZE); the API key comes from
 * DASHSCOPE_API_KEY unless --api-key is passed.
 */
export async function loadServerConfig(args: string[], env: NodeJS.ProcessEnv): Promise<ServerConfig> {
  const argv = await yargs(args)
    .env('PAPERQA')
    .option('workspace-root', {
      type: 'string',
      description: 'Directory that document paths are resolved against',
    })
    .option('allow-outside-workspace', {
      type: 'boolean',
      default: false,
      description: 'Allow document paths outside the workspace root',
    })
    .option('cache-dir', {
      type: 'string',
      default: DEFAULT_CACHE_DIR,
      description: 'Embedding cache directory, relative to the workspace root',
    })
    .option('api-key', {
      type: 'string',
      description: `API key for the embedding and chat services (defaults to ${API_KEY_ENV})`,
    })
    .option('embedding-provider', {
      choices: ['mock', 'http', 'ollama'] as const,
      description: 'Embedding provider (defaults to http when an API key is set, mock otherwise)',
    })
    .option('embedding-base-url', {
      type: 'string',
      default: DEFAULT_COMPATIBLE_BASE_URL,
      description: 'Base URL of the OpenAI-compatible embedding API',
    })
    .option('embedding-model', {
      type: 'string',
      default: 'text-embedding-v4',
      description: 'Embedding model identifier',
    })
    .option('embedding-dimension', {
      type: 'number',
      default: DEFAULT_EMBEDDING_DIMENSION,
      description: 'Dimension of every embedding vector',
    })
    .option('ollama-model', {
      type: 'string',
      default: 'nomic-embed-text',
      description: 'Ollama embedding model name',
    })
    .option('ollama-base-url', {
      type: 'string',
      description: 'Ollama base URL (optional)',
    })
    .option('chat-provider', {
      choices: ['mock', 'openai'] as const,
      description: 'Chat provider (defaults to openai when an API key is set, mock otherwise)',
    })
    .option('chat-base-url', {
      type: 'string',
      default: DEFAULT_COMPATIBLE_BASE_URL,
      description: 'Base URL of the OpenAI-compatible chat API',
    })
    .option('chat-model', {
      type: 'string',
      default: 'qwen-plus',
      description: 'Chat model identifier',
    })
    .option('temperature', { type: 'number', default: 0.1, description: 'Sampling temperature' })
    .option('max-tokens', { type: 'number', default: 1000, description: 'Maximum tokens per answer' })
    .option('chunk-size', { type: 'number', default: 1000, description: 'Characters per segment' })
    .option('chunk-overlap', { type: 'number', default: 200, description: 'Characters shared by neighbouring segments' })
    .option('batch-size', { type: 'number', default: 4, description: 'Segments per embedding request' })
    .option('concurrency', { type: 'number', default: 1, description: 'Embedding requests in flight at once' })
    .option('top-k', { type: 'number', default: 5, description: 'Segments retrieved per question' })
    .option('max-attempts', { type: 'number', default: 3, description: 'Attempts per remote call' })
    .option('base-delay-ms', { type: 'number', default: 1000, description: 'First retry delay' })
    .option('max-delay-ms', { type: 'number', default: 30_000, description: 'Retry delay cap' })
    .option('build-timeout-ms', { type: 'number', description: 'Upper bound on one index build' })
    .option('log-level', {
      choices: ['debug', 'info', 'warn', 'error', 'silent'] as const,
      default: 'info' as const,
      description: 'Log level (logs go to stderr)',
    })
    .strict()
    .fail((message: string, error?: Error) => {
      throw error ?? new InvalidConfigError(message);
    })
    .help()
    .alias('h', 'help')
    .parseAsync();

  const apiKey = argv.apiKey ?? env[API_KEY_ENV];
  const embeddingProvider = argv.embeddingProvider ?? (apiKey ? 'http' : 'mock');
  const chatProvider = argv.chatProvider ?? (apiKey ? 'openai' : 'mock');
  if (!apiKey && (argv.embeddingProvider === undefined || argv.chatProvider === undefined)) {
    log.warn(`${API_KEY_ENV} is not set; using offline mock providers where none was chosen.`);
  }

  let embedding: RagConfigInput['embedding'];
  switch (embeddingProvider) {
    case 'http':
      embedding = {
        provider: EmbeddingModelProvider.Http,
        apiKey: apiKey ?? '',
        baseURL: argv.embeddingBaseUrl,
        model: argv.embeddingModel,
        dimension: argv.embeddingDimension,
      };
      break;
    case 'ollama':
      embedding = {
        provider: EmbeddingModelProvider.Ollama,
        modelName: argv.ollamaModel,
        baseURL: argv.ollamaBaseUrl,
        dimension: argv.embeddingDimension,
      };
      break;
    case 'mock':
      embedding = { provider: EmbeddingModelProvider.Mock, dimension: argv.embeddingDimension };
      break;
  }

  const chat: RagConfigInput['chat'] =
    chatProvider === 'openai'
      ? {
          provider: ChatModelProvider.OpenAI,
          apiKey: apiKey ?? '',
          baseURL: argv.chatBaseUrl,
          model: argv.chatModel,
          temperature: argv.temperature,
          maxTokens: argv.maxTokens,
        }
      : { provider: ChatModelProvider.Mock };

  const rag = parseRagConfig({
    chunking: { size: argv.chunkSize, overlap: argv.chunkOverlap },
    embedding,
    chat,
    batchSize: argv.batchSize,
    embeddingConcurrency: argv.concurrency,
    retrievalK: argv.topK,
    retry: { maxAttempts: argv.maxAttempts, baseDelayMs: argv.baseDelayMs, maxDelayMs: argv.maxDelayMs },
    cacheDir: argv.cacheDir,
    buildTimeoutMs: argv.buildTimeoutMs,
  } satisfies RagConfigInput);

  const workspaceRoot = path.resolve(argv.workspaceRoot ?? process.cwd());
  return {
    workspaceRoot,
    allowOutsideWorkspace: argv.allowOutsideWorkspace,
    cacheDir: path.resolve(workspaceRoot, rag.cacheDir),
    logLevel: parseLogLevel(argv.logLevel, LogLevel.INFO),
    rag,
  };
}

/** Opens the cache, wires the pipeline and session, and serves the RAG tools over stdio. */
export async function startServer(config: ServerConfig): Promise<McpServer> {
  setLogLevel(config.logLevel);
  const { name, version, description } = packageInfo;

  const cacheStore = await FsCacheStore.open(config.cacheDir);
  const pipeline = RagPipeline.fromConfig(config.rag, cacheStore);
  const session = new PaperQaSession({ pipeline, cacheStore });
  log.info(`Embedding cache at ${config.cacheDir}; embedding provider ${config.rag.embedding.provider}`);

  return startMcpServer(
    { name, version, description, tools: ragTools },
    {
      workspaceRoot: config.workspaceRoot,
      allowOutsideWorkspace: config.allowOutsideWorkspace,
      session,
    },
  );
}
