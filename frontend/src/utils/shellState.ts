// Application shell model and its transitions
import type { AppModel, Route, ShellEvent, UIState, UrlRequest } from '../types/game';
import type { NavigationService } from '../services/navigation';
import { routeFromUrl } from './router';

export const VIEWING: UIState = { kind: 'viewing' };

export function initModel(url: string, navigation: NavigationService): AppModel {
  return {
    navigation,
    url,
    route: routeFromUrl(url),
    state: VIEWING,
  };
}

export function shellReducer(model: AppModel, event: ShellEvent): AppModel {
  switch (event.type) {
    case 'urlChanged':
      if (event.url === model.url) return model;
      return { ...model, url: event.url, route: routeFromUrl(event.url) };
    case 'stateUpdated':
      return { ...model, state: event.state };
  }
}

/**
 * Internal requests go through history (and come back as `urlChanged`);
 * external ones leave the app. The model itself is never touched here.
 */
export function handleNavigationRequest(model: AppModel, request: UrlRequest): void {
  switch (request.kind) {
    case 'internal':
      model.navigation.pushInternal(request.path);
      break;
    case 'external':
      model.navigation.loadExternal(request.href);
      break;
  }
}

// Settings only appears once the player has left the landing panel
export function footerTabs(state: UIState): Route[] {
  return state.kind === 'viewing' ? ['info', 'game'] : ['info', 'game', 'settings'];
}
