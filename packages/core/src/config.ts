import { z } from "zod";
import { ValidationError } from "arbor-shared";
import { ContextKey, type ContextProvision } from "./compose/context";
import { isExecutor, type Executor } from "./runtime/executor";
import { isUpdater, type Updater } from "./runtime/updater";

export interface ComposerOptions {
  /** Composer id in logs; a random UUID when omitted */
  name?: string;
  /** Log the composition tree after every pass. Defaults to `NODE_ENV === 'development'`. */
  dev?: boolean;
  /** Receives deferred updates; defaults to the runtime's own queue */
  updater?: Updater;
  /** Runs `useTask` bodies; defaults to a `MicrotaskExecutor` */
  executor?: Executor;
  /** Context values visible to the whole tree */
  contexts?: readonly ContextProvision[];
}

export interface ResolvedComposerOptions {
  name?: string;
  dev: boolean;
  updater?: Updater;
  executor?: Executor;
  contexts: readonly ContextProvision[];
}

export interface GlobalComposerConfig {
  dev?: boolean;
}

function isContextProvision(value: unknown): value is ContextProvision {
  return (
    typeof value === "object" &&
    value !== null &&
    "key" in value &&
    value.key instanceof ContextKey &&
    "apply" in value &&
    typeof value.apply === "function"
  );
}

export const composerOptionsSchema = z.object({
  name: z.string().min(1, "name must not be empty").optional(),
  dev: z.boolean().optional(),
  updater: z.custom<Updater>(isUpdater, "updater must have an update(update) method").optional(),
  executor: z.custom<Executor>(isExecutor, "executor must have a spawn(task) method").optional(),
  contexts: z
    .array(z.custom<ContextProvision>(isContextProvision, "contexts must be created with provide()"))
    .optional(),
});

const globalConfigSchema = composerOptionsSchema.pick({ dev: true });

const config: GlobalComposerConfig = {};

function parse<T>(schema: z.ZodType<T>, input: unknown): T {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? `options.${issue.path.join(".")}` : "options";
  throw new ValidationError(
    field,
    issue?.message ?? "Invalid composer options",
    { code: "VALIDATION_CONSTRAINT" },
    result.error,
  );
}

/**
 * Configure defaults for every composer created afterwards.
 *
 * @example
 * ```typescript
 * configureComposer({ dev: true });
 * ```
 */
export function configureComposer(options: GlobalComposerConfig): void {
  const parsed = parse(globalConfigSchema, options);
  if (parsed.dev !== undefined) {
    config.dev = parsed.dev;
  }
}

export function getComposerDefaults(): Readonly<GlobalComposerConfig> {
  return { ...config };
}

export function resetComposerDefaults(): void {
  delete config.dev;
}

/**
 * Validate composer options and fill in defaults.
 * Throws `ValidationError` naming the first invalid field.
 */
export function resolveComposerOptions(options: ComposerOptions = {}): ResolvedComposerOptions {
  const parsed = parse(composerOptionsSchema, options);
  return {
    name: parsed.name,
    dev: parsed.dev ?? config.dev ?? process.env["NODE_ENV"] === "development",
    updater: parsed.updater,
    executor: parsed.executor,
    contexts: parsed.contexts ?? [],
  };
}
