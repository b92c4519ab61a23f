import type { CaptureConfig } from './config';
import type { CaptureChannel, HandlerDescriptor } from './types';

export interface RequestAttributes {
  kind: string;
  path: string;
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+/, '');
}

/**
 * Matches a path against a rule where `*` stands for any run of characters.
 * Leading slashes are ignored on both sides.
 */
export function matchesPathRule(rule: string, path: string): boolean {
  const pattern = trimSlashes(rule);
  const subject = trimSlashes(path.split('?')[0]);

  if (pattern === subject) {
    return true;
  }

  const source = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');

  return new RegExp(`^${source}$`).test(subject);
}

export function isEnabled(config: CaptureConfig, kind: string): boolean {
  return config.enabled.has(kind);
}

export function shouldCapture(config: CaptureConfig, attributes: RequestAttributes): boolean {
  if (!isEnabled(config, attributes.kind)) {
    return false;
  }

  if (config.onlyPaths.some((rule) => matchesPathRule(rule, attributes.path))) {
    return true;
  }

  return !config.ignorePaths.some((rule) => matchesPathRule(rule, attributes.path));
}

export function channelFor(handler: HandlerDescriptor): CaptureChannel {
  return handler.transport === 'http' ? 'request' : 'service';
}
