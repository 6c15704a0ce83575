import React from 'react';
import type { UrlRequest } from '../types/game';
import { RULES_URL } from '../config';
import { AppLink } from '../components';

interface InfoPageProps {
  onNavigate: (request: UrlRequest) => void;
}

const InfoPage: React.FC<InfoPageProps> = ({ onNavigate }) => (
  <div className="info-page">
    <h2>About</h2>
    <p>
      Mafia is a party game of hidden roles. Each night the Mafia picks a victim; each day the town votes on who
      to eliminate.
    </p>
    <p>
      <AppLink href={RULES_URL} onNavigate={onNavigate} className="rules-link">
        Read the full rules
      </AppLink>
    </p>
  </div>
);

export default InfoPage;
