import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Bot } from '../../application/bot.js';
import { isHandlerDescriptor } from '../../application/handler.js';
import type { HandlerDescriptor } from '../../application/handler.js';
import type { BotEvent } from '../../domain/index.js';
import { HandlerLoadError } from '../../domain/index.js';

export type ModuleImporter = (specifier: string) => Promise<Record<string, unknown>>;

const dynamicImport: ModuleImporter = (specifier) => import(specifier);

/** Paths are resolved against the working directory; bare specifiers go to node resolution. */
export function resolveSpecifier(specifier: string, cwd: string = process.cwd()): string {
  if (specifier.startsWith('.') || isAbsolute(specifier)) {
    return pathToFileURL(resolve(cwd, specifier)).href;
  }
  return specifier;
}

/**
 * Collects handler descriptors from a module namespace.
 *
 * Every export is inspected, the default included. An export may be a
 * descriptor or an array of descriptors. Duplicates (the same object
 * exported twice) are kept once.
 */
export function collectDescriptors(namespace: Record<string, unknown>): HandlerDescriptor[] {
  const found = new Set<HandlerDescriptor>();
  for (const value of Object.values(namespace)) {
    const candidates: unknown[] = Array.isArray(value) ? value : [value];
    for (const candidate of candidates) {
      if (isHandlerDescriptor(candidate)) found.add(candidate);
    }
  }
  return [...found];
}

/**
 * Imports a module and registers every handler it exports.
 *
 * @throws HandlerLoadError when the import fails or the module exports no handlers.
 * Registration errors (invalid priority, duplicate) propagate unchanged.
 */
export async function loadHandlerModule<E extends BotEvent>(
  bot: Bot<E>,
  specifier: string,
  importer: ModuleImporter = dynamicImport,
): Promise<HandlerDescriptor[]> {
  let namespace: Record<string, unknown>;
  try {
    namespace = await importer(resolveSpecifier(specifier));
  } catch (err: unknown) {
    throw new HandlerLoadError(specifier, 'import failed', err);
  }

  const descriptors = collectDescriptors(namespace);
  if (descriptors.length === 0) {
    throw new HandlerLoadError(specifier, 'module exports no handlers');
  }

  for (const descriptor of descriptors) {
    bot.handlers.register(descriptor);
  }

  bot.log.info(
    { module: specifier, handlers: descriptors.map((d) => d.name) },
    `Succeeded to load handlers from module "${specifier}"`,
  );
  return descriptors;
}
