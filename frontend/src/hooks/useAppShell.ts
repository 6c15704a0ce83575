import { useCallback, useEffect, useReducer, useRef, useState } from 'react';
import { useLocation, useNavigate } from 'react-router-dom';
import type { AppModel, UIState, UrlRequest } from '../types/game';
import { assignLocation, createNavigationService } from '../services/navigation';
import { handleNavigationRequest, initModel, shellReducer } from '../utils/shellState';

export interface AppShellOptions {
  /** Replaces the full page load used for external links */
  loadExternalUrl?: (href: string) => void;
}

export interface AppShell {
  model: AppModel;
  requestNavigation: (request: UrlRequest) => void;
  updateState: (state: UIState) => void;
}

export const useAppShell = ({ loadExternalUrl }: AppShellOptions = {}): AppShell => {
  const location = useLocation();
  const navigate = useNavigate();
  const url = `${location.pathname}${location.search}${location.hash}`;

  // navigate and the loader may change identity between renders; the service is built once
  const navigateRef = useRef(navigate);
  const loadRef = useRef(loadExternalUrl);
  useEffect(() => {
    navigateRef.current = navigate;
    loadRef.current = loadExternalUrl;
  }, [navigate, loadExternalUrl]);

  const [navigation] = useState(() =>
    createNavigationService({
      push: (path) => navigateRef.current(path),
      load: (href) => (loadRef.current ?? assignLocation)(href),
    })
  );

  const [stored, dispatch] = useReducer(shellReducer, url, (initialUrl) => initModel(initialUrl, navigation));

  // Apply a location change within the render that sees it, so the route never lags the URL
  const model = stored.url === url ? stored : shellReducer(stored, { type: 'urlChanged', url });
  if (model !== stored) {
    dispatch({ type: 'urlChanged', url });
  }

  const requestNavigation = useCallback(
    (request: UrlRequest) => handleNavigationRequest(model, request),
    [model]
  );

  const updateState = useCallback((state: UIState) => {
    dispatch({ type: 'stateUpdated', state });
  }, []);

  return { model, requestNavigation, updateState };
};
