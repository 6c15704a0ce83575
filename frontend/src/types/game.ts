// Type definitions for the Mafia client shell

import type { NavigationService } from '../services/navigation';

export type Route = 'game' | 'info' | 'settings' | 'notFound';

export type LobbyRole = 'host' | 'player';

// Which sub-view the game route renders
export type UIState =
  | { kind: 'viewing' }
  | { kind: 'lobby'; role: LobbyRole }
  | { kind: 'playing' };

export interface AppModel {
  navigation: NavigationService;
  url: string;
  route: Route; // always routeFromUrl(url)
  state: UIState;
}

export type UrlRequest =
  | { kind: 'internal'; path: string }
  | { kind: 'external'; href: string };

export type ShellEvent =
  | { type: 'urlChanged'; url: string }
  | { type: 'stateUpdated'; state: UIState };
