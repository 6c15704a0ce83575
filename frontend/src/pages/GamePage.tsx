import React from 'react';
import type { UIState } from '../types/game';
import { LandingPanel, PlayingPanel, WaitingLobby } from '../components';
import './GamePage.css';

interface GamePageProps {
  uiState: UIState;
  onStateChange: (state: UIState) => void;
}

const GamePage: React.FC<GamePageProps> = ({ uiState, onStateChange }) => {
  switch (uiState.kind) {
    case 'viewing':
      return (
        <LandingPanel
          onCreateGame={() => onStateChange({ kind: 'lobby', role: 'host' })}
          onJoinGame={() => onStateChange({ kind: 'lobby', role: 'player' })}
        />
      );
    case 'lobby':
      return <WaitingLobby role={uiState.role} />;
    case 'playing':
      // TODO: nothing moves a lobby to 'playing' until game start is wired to a server
      return <PlayingPanel />;
  }
};

export default GamePage;
