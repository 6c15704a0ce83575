import React from 'react';

interface LandingPanelProps {
  onCreateGame: () => void;
  onJoinGame: () => void;
}

export const LandingPanel: React.FC<LandingPanelProps> = ({ onCreateGame, onJoinGame }) => (
  <div className="lobby-card">
    <p className="lobby-intro">Gather your friends, pick a host, and find the Mafia before it finds you.</p>
    <div className="lobby-actions">
      <button type="button" className="create-btn" onClick={onCreateGame}>
        Create game
      </button>
      <button type="button" className="join-btn" onClick={onJoinGame}>
        Join game
      </button>
    </div>
  </div>
);
