import path from 'node:path';

import { describeError } from './errors';
import { HookService } from './hookService';
import { logger } from './logger';

export type HookModuleImporter = (specifier: string) => Promise<unknown>;

export interface HookModule {
  registerHooks(service: HookService): void | Promise<void>;
}

const isHookModule = (value: unknown): value is HookModule =>
  typeof value === 'object' &&
  value !== null &&
  'registerHooks' in value &&
  typeof value.registerHooks === 'function';

// compiled to require() under CommonJS, so ES module hook files are refused
const defaultImporter: HookModuleImporter = (specifier) => import(specifier);

const isRequireEsmError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ERR_REQUIRE_ESM';

const resolveSpecifier = (specifier: string, cwd: string): string =>
  specifier.startsWith('.') ? path.resolve(cwd, specifier) : specifier;

export interface HookModuleLoadReport {
  loaded: string[];
  failed: Array<{ specifier: string; error: string }>;
}

/**
 * Imports each module and lets it register its hooks. A module that cannot be
 * loaded, or whose `registerHooks` throws, is reported and skipped.
 */
export const loadHookModules = async (
  service: HookService,
  specifiers: readonly string[],
  { importer = defaultImporter, cwd = process.cwd() }: { importer?: HookModuleImporter; cwd?: string } = {},
): Promise<HookModuleLoadReport> => {
  const report: HookModuleLoadReport = { loaded: [], failed: [] };

  for (const specifier of specifiers) {
    try {
      const imported = await importer(resolveSpecifier(specifier, cwd));
      const candidate = isHookModule(imported)
        ? imported
        : typeof imported === 'object' && imported !== null && 'default' in imported && isHookModule(imported.default)
          ? imported.default
          : undefined;
      if (!candidate) {
        throw new Error('module does not export registerHooks(service)');
      }
      await candidate.registerHooks(service);
      report.loaded.push(specifier);
      logger.info({ specifier }, 'Hook module loaded');
    } catch (error) {
      const message = isRequireEsmError(error)
        ? 'hook modules must be CommonJS; ES modules (.mjs or "type": "module") cannot be loaded'
        : describeError(error);
      report.failed.push({ specifier, error: message });
      logger.error({ specifier, error: message }, 'Failed to load hook module');
    }
  }

  return report;
};
