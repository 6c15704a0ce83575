// URL path → Route mapping
import type { Route } from '../types/game';

const ROUTE_PATHS: Record<Route, string> = {
  game: '/',
  info: '/info',
  settings: '/settings',
  notFound: '/not_found',
};

const ROUTE_LABELS: Record<Route, string> = {
  game: 'Game',
  info: 'Info',
  settings: 'Settings',
  notFound: 'Not found',
};

/**
 * Exact, case-sensitive match. Anything unrecognised is `notFound`.
 */
export const routeFromPath = (path: string): Route => {
  switch (path) {
    case '':
    case '/':
    case '/game':
      return 'game';
    case '/info':
      return 'info';
    case '/settings':
      return 'settings';
    default:
      return 'notFound';
  }
};

/**
 * Drop scheme and authority, query string and fragment.
 * `https://host/info?x=1#top` → `/info`
 */
export const pathFromUrl = (url: string): string => {
  const withoutOrigin = url.replace(/^[a-z][a-z\d+.-]*:\/\/[^/?#]*/i, '');
  const end = withoutOrigin.search(/[?#]/);
  return end === -1 ? withoutOrigin : withoutOrigin.slice(0, end);
};

export const routeFromUrl = (url: string): Route => routeFromPath(pathFromUrl(url));

export const pathForRoute = (route: Route): string => ROUTE_PATHS[route];

export const routeLabel = (route: Route): string => ROUTE_LABELS[route];
