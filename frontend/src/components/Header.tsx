import React from 'react';
import type { UrlRequest } from '../types/game';
import { pathForRoute } from '../utils/router';
import { AppLink } from './AppLink';

interface HeaderProps {
  title: string;
  onNavigate: (request: UrlRequest) => void;
}

export const Header: React.FC<HeaderProps> = ({ title, onNavigate }) => (
  <header className="app-header">
    <AppLink href={pathForRoute('game')} onNavigate={onNavigate} className="app-title">
      <h1>{title}</h1>
    </AppLink>
  </header>
);
