import React from 'react';

export const PlayingPanel: React.FC = () => (
  <div className="playing-panel">
    <h2>Game in progress</h2>
    <p>Night falls over the town.</p>
  </div>
);
