import React from 'react';
import type { UrlRequest } from '../types/game';
import { AppLink } from '../components';
import { pathForRoute } from '../utils/router';

interface NotFoundPageProps {
  onNavigate: (request: UrlRequest) => void;
}

const NotFoundPage: React.FC<NotFoundPageProps> = ({ onNavigate }) => (
  <div className="not-found-page">
    <h2>Page not found</h2>
    <AppLink href={pathForRoute('game')} onNavigate={onNavigate} className="back-link">
      Back to the game
    </AppLink>
  </div>
);

export default NotFoundPage;
