import { z } from 'zod';

export const llmProviders = [
  'openai',
  'anthropic',
  'google',
  'ollama',
  'openai-compatible'
] as const;
export type LLMProvider = (typeof llmProviders)[number];

export const DEFAULT_PORT = 6380;
export const DEFAULT_SEARCH_TIMEOUT_MS = 5000;

const llmSchema = z
  .object({
    provider: z.enum(llmProviders),
    providerName: z.string().min(1).optional(),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional()
  })
  .superRefine((data, ctx) => {
    const cloudProviders: readonly LLMProvider[] = ['openai', 'anthropic', 'google'];
    if (cloudProviders.includes(data.provider)) {
      if (!data.apiKey)
        ctx.addIssue({
          code: 'custom',
          path: ['apiKey'],
          message: `apiKey required for provider '${data.provider}'`
        });
      if (data.baseUrl)
        ctx.addIssue({
          code: 'custom',
          path: ['baseUrl'],
          message: `baseUrl not allowed for provider '${data.provider}'`
        });
    }
    if (data.provider === 'openai-compatible' && !data.baseUrl) {
      ctx.addIssue({
        code: 'custom',
        path: ['baseUrl'],
        message: "baseUrl required for provider 'openai-compatible'"
      });
    }
    if (data.provider !== 'openai-compatible' && data.providerName) {
      ctx.addIssue({
        code: 'custom',
        path: ['providerName'],
        message: "providerName only allowed for provider 'openai-compatible'"
      });
    }
  });
export type LLMConfig = z.infer<typeof llmSchema>;

export const configSchema = z
  .object({
    $schema: z.string().optional(),

    server: z
      .object({
        port: z.number().int().min(1).max(65535).default(DEFAULT_PORT)
      })
      .optional(),

    neo4j: z.object({
      uri: z.string().min(1),
      user: z.string().min(1),
      password: z.string(),
      database: z.string().min(1).default('neo4j'),
      transactionTimeoutMs: z.number().int().positive().optional()
    }),

    llm: llmSchema,

    schema: z.object({
      /** JSON schema descriptor, relative to the working directory */
      path: z.string().min(1)
    }),

    strategies: z
      .object({
        /** Preset loaded at startup (default: the built-in defaults) */
        preset: z.string().min(1).optional()
      })
      .optional(),

    retrieval: z
      .object({
        searchTimeoutMs: z.number().int().positive().default(DEFAULT_SEARCH_TIMEOUT_MS)
      })
      .optional()
  })
  .transform((data) => ({
    ...data,
    server: { port: data.server?.port ?? DEFAULT_PORT },
    strategies: { preset: data.strategies?.preset },
    retrieval: {
      searchTimeoutMs: data.retrieval?.searchTimeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS
    }
  }));

export type ConfigInput = z.input<typeof configSchema>;
export type Config = z.output<typeof configSchema>;
