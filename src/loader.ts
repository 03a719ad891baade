import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { planThreads } from './config';
import { EngineLoadError } from './errors';
import type { EngineBinding, EngineOptions, InferenceEngine, LoadOptions } from './types';

const isEngineBinding = (mod: unknown): mod is EngineBinding =>
  typeof mod === 'object' &&
  mod !== null &&
  'createEngine' in mod &&
  typeof mod.createEngine === 'function';

/** Paths are resolved against the working directory; anything else is a package name */
const toImportTarget = (specifier: string): string =>
  specifier.startsWith('.') || path.isAbsolute(specifier)
    ? pathToFileURL(path.resolve(specifier)).href
    : specifier;

/**
 * Try to load an engine module, return null on failure.
 *
 * Accepts `createEngine` as a named export or on the default export.
 */
const tryLoadModule = async (specifier: string, verbose = false): Promise<EngineBinding | null> => {
  try {
    const mod: unknown = await import(toImportTarget(specifier));
    if (isEngineBinding(mod)) return mod;
    if (typeof mod === 'object' && mod !== null && 'default' in mod && isEngineBinding(mod.default)) {
      return mod.default;
    }
    if (verbose) {
      console.warn(`[turnloop] ${specifier} loaded but missing createEngine export`);
    }
    return null;
  } catch (e) {
    if (verbose) {
      const message = e instanceof Error ? e.message : String(e);
      console.warn(`[turnloop] Failed to load ${specifier}: ${message}`);
    }
    return null;
  }
};

/**
 * Resolve an engine module
 *
 * turnloop does no inference itself. An engine is any module that exports
 * `createEngine(options)` resolving to an {@link InferenceEngine}: a package
 * wrapping a native runtime, a remote client, or a test double.
 *
 * Resolution order:
 *
 * 1. `specifier`, when given
 * 2. `TURNLOOP_ENGINE` environment variable
 *
 * Specifiers starting with `.` or `/` are file paths relative to the working
 * directory; everything else is imported as a package.
 *
 * **Environment variables:**
 * - `TURNLOOP_ENGINE`: engine module to use when none is passed
 * - `TURNLOOP_VERBOSE=1`: warn about each candidate that fails to load
 *
 * @param specifier Engine package name or path
 * @returns Engine module with createEngine method
 * @throws EngineLoadError if no candidate loads
 *
 * @example
 * ```typescript
 * const binding = await loadEngine('./engines/my-engine.js');
 * const engine = await binding.createEngine({ threads: planThreads(4) });
 * ```
 *
 * @category Core
 */
export const loadEngine = async (specifier?: string): Promise<EngineBinding> => {
  const verbose = process.env.TURNLOOP_VERBOSE === '1';
  const candidates = [specifier, process.env.TURNLOOP_ENGINE].filter(
    (c): c is string => typeof c === 'string' && c.length > 0
  );

  if (candidates.length === 0) {
    throw new EngineLoadError(
      '[turnloop] No engine specified. Pass --engine <module> or set TURNLOOP_ENGINE.'
    );
  }

  for (const candidate of candidates) {
    const binding = await tryLoadModule(candidate, verbose);
    if (binding) return binding;
  }

  throw new EngineLoadError(`[turnloop] No engine could be loaded. Tried: ${candidates.join(', ')}`);
};

/**
 * Create an inference engine
 *
 * Resolves the engine module (see {@link loadEngine}) and hands it the thread
 * plan: pool size plus a pinning request for pools larger than ten threads.
 *
 * @param options Engine paths and thread count
 * @param loadOptions Engine module selection
 *
 * @example
 * ```typescript
 * const engine = await createEngine(
 *   { weights: './model.sbs', tokenizer: './tokenizer.spm', numThreads: 8 },
 *   { engine: 'my-engine' }
 * );
 * try {
 *   console.log(await complete(engine, 'Hello', resolveConfig({})));
 * } finally {
 *   engine.dispose?.();
 * }
 * ```
 *
 * @category Core
 */
export const createEngine = async (
  options: Omit<EngineOptions, 'threads'> & { numThreads: number },
  loadOptions?: LoadOptions
): Promise<InferenceEngine> => {
  const binding = await loadEngine(loadOptions?.engine);
  const { numThreads, ...paths } = options;
  return binding.createEngine({ ...paths, threads: planThreads(numThreads) });
};
