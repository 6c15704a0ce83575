import React, { useEffect } from 'react';
import type { AppModel, UIState, UrlRequest } from './types/game';
import { APP_TITLE } from './config';
import { useAppShell } from './hooks/useAppShell';
import { footerTabs } from './utils/shellState';
import { Footer, Header } from './components';
import GamePage from './pages/GamePage';
import InfoPage from './pages/InfoPage';
import SettingsPage from './pages/SettingsPage';
import NotFoundPage from './pages/NotFoundPage';
import './App.css';

interface AppProps {
  loadExternalUrl?: (href: string) => void;
}

const renderRoute = (
  model: AppModel,
  requestNavigation: (request: UrlRequest) => void,
  updateState: (state: UIState) => void
) => {
  switch (model.route) {
    case 'game':
      return <GamePage uiState={model.state} onStateChange={updateState} />;
    case 'info':
      return <InfoPage onNavigate={requestNavigation} />;
    case 'settings':
      return <SettingsPage />;
    case 'notFound':
      return <NotFoundPage onNavigate={requestNavigation} />;
  }
};

function App({ loadExternalUrl }: AppProps) {
  const { model, requestNavigation, updateState } = useAppShell({ loadExternalUrl });

  useEffect(() => {
    document.title = APP_TITLE;
  }, []);

  return (
    <div className="app-shell">
      <Header title={APP_TITLE} onNavigate={requestNavigation} />
      <main className="app-main">{renderRoute(model, requestNavigation, updateState)}</main>
      <Footer tabs={footerTabs(model.state)} activeRoute={model.route} onNavigate={requestNavigation} />
    </div>
  );
}

export default App;
