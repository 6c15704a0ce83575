import React from 'react';
import type { Route, UrlRequest } from '../types/game';
import { pathForRoute, routeLabel } from '../utils/router';
import { AppLink } from './AppLink';

interface FooterProps {
  tabs: Route[];
  activeRoute: Route;
  onNavigate: (request: UrlRequest) => void;
}

export const Footer: React.FC<FooterProps> = ({ tabs, activeRoute, onNavigate }) => (
  <footer className="app-footer">
    <nav className="footer-tabs">
      {tabs.map((route) => {
        const isActive = route === activeRoute;
        return (
          <AppLink
            key={route}
            href={pathForRoute(route)}
            onNavigate={onNavigate}
            className={`footer-tab ${isActive ? 'active' : ''}`}
            aria-current={isActive ? 'page' : undefined}
          >
            {routeLabel(route)}
          </AppLink>
        );
      })}
    </nav>
  </footer>
);
