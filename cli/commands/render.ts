import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { ConfigLoader } from '@core/config/loader';
import { TagweaveError, ErrorSeverity, TagErrorCode } from '@core/errors';
import type { TagDiagnostic } from '@core/types/diagnostics';
import { cliLogger } from '@core/utils/logger';
import { TagResolver } from '@interpreter/index';
import { createResolutionContext, type ResolutionContextInit } from '@interpreter/env/ResolutionContext';

export interface RenderCommandOptions {
  /** JSON file holding `{ get, post, cookie, server, session, globals }` */
  context?: string;
  /** Expose process.env as the server store */
  env?: boolean;
  /** Disable HTML escaping for every tag */
  raw?: boolean;
  /** Write the result here instead of returning it for stdout */
  output?: string;
  /** Print fail-soft diagnostics to stderr */
  diagnostics?: boolean;
  /** Directory searched for tagweave.config.json; defaults to the template's */
  projectPath?: string;
}

export interface RenderCommandResult {
  output: string;
  diagnostics: TagDiagnostic[];
}

const CONTEXT_KEYS = {
  get: 'query',
  post: 'form',
  cookie: 'cookies',
  server: 'server',
  session: 'session',
  globals: 'globals'
} as const;

type ContextFileKey = keyof typeof CONTEXT_KEYS;

/**
 * Read a context file and map its sections onto the resolution stores.
 */
export function loadContextFile(filePath: string): ResolutionContextInit {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new TagweaveError(`Cannot read context file ${filePath}`, {
      code: TagErrorCode.CONFIG_INVALID,
      severity: ErrorSeverity.Fatal,
      details: { filePath },
      cause: error
    });
  }

  if (!isRecord(parsed)) {
    throw new TagweaveError(`Context file ${filePath} must contain a JSON object`, {
      code: TagErrorCode.CONFIG_INVALID,
      severity: ErrorSeverity.Fatal,
      details: { filePath }
    });
  }

  const init: ResolutionContextInit = {};
  for (const key of Object.keys(parsed)) {
    if (!isContextKey(key)) {
      cliLogger.warn(`Ignoring unknown context section '${key}'`, { filePath });
      continue;
    }
    const section = parsed[key];
    if (!isRecord(section)) {
      throw new TagweaveError(`Context section '${key}' must be an object`, {
        code: TagErrorCode.CONFIG_INVALID,
        severity: ErrorSeverity.Fatal,
        details: { filePath, section: key }
      });
    }
    init[CONTEXT_KEYS[key]] = section;
  }

  return init;
}

/**
 * Render one template file.
 */
export function renderCommand(templatePath: string, options: RenderCommandOptions = {}): RenderCommandResult {
  const template = fs.readFileSync(templatePath, 'utf8');
  const init = options.context ? loadContextFile(options.context) : {};

  if (options.env) {
    init.server = { ...process.env, ...(isRecord(init.server) ? init.server : {}) };
  }

  const projectPath = options.projectPath ?? path.dirname(path.resolve(templatePath));
  const config = new ConfigLoader(projectPath).loadResolved();
  const diagnostics: TagDiagnostic[] = [];

  const resolver = new TagResolver(createResolutionContext(init), {
    config,
    sanitize: options.raw ? false : undefined,
    onDiagnostic: diagnostic => diagnostics.push(diagnostic)
  });

  const output = resolver.resolveBuffer(template);
  cliLogger.debug('Rendered template', { templatePath, diagnostics: diagnostics.length });

  if (options.output) {
    fs.writeFileSync(options.output, output);
  }

  return { output, diagnostics };
}

export function formatDiagnostic(diagnostic: TagDiagnostic): string {
  return `${chalk.yellow(diagnostic.code)} ${chalk.cyan(diagnostic.tag)} ${diagnostic.message}`;
}

function isContextKey(key: string): key is ContextFileKey {
  return Object.prototype.hasOwnProperty.call(CONTEXT_KEYS, key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
