import React from 'react';
import type { LobbyRole } from '../types/game';

interface WaitingLobbyProps {
  role: LobbyRole;
}

export const WaitingLobby: React.FC<WaitingLobbyProps> = ({ role }) => (
  <div className="waiting-lobby">
    <div className="waiting-card">
      <h2>Waiting room</h2>
      {/* Start Game lives with the host; players only wait */}
      {role === 'host' ? (
        <p className="waiting-message">You are hosting. Waiting for players to join...</p>
      ) : (
        <p className="waiting-message">Waiting for the host to start the game...</p>
      )}
    </div>
  </div>
);
