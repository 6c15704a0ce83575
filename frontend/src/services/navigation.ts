// Navigation service: the only way the shell touches browser history
import type { UrlRequest } from '../types/game';
import { createLogger } from '../utils/logger';

const log = createLogger('navigation');

export interface NavigationService {
  /** Push an in-app path onto history; the router then reports the URL change */
  pushInternal(path: string): void;
  /** Leave the app with a full page load */
  loadExternal(href: string): void;
}

interface NavigationHandlers {
  push: (path: string) => void;
  load: (href: string) => void;
}

export const assignLocation = (href: string): void => {
  window.location.assign(href);
};

export const createNavigationService = ({ push, load }: NavigationHandlers): NavigationService => ({
  pushInternal(path: string): void {
    log.debug('Pushing internal path:', path);
    push(path);
  },

  loadExternal(href: string): void {
    log.info('Leaving app for:', href);
    load(href);
  },
});

/**
 * Decide whether an href stays inside the app.
 * Same origin → internal (path + query + fragment), otherwise external.
 * An href that cannot be parsed is kept internal as-is.
 */
export function classifyUrlRequest(href: string, origin: string): UrlRequest {
  let target: URL;
  try {
    target = new URL(href, origin);
  } catch (err) {
    log.warn('Unparsable href, routing internally:', href, err);
    return { kind: 'internal', path: href };
  }

  if (target.origin === origin) {
    return { kind: 'internal', path: `${target.pathname}${target.search}${target.hash}` };
  }
  return { kind: 'external', href: target.href };
}
