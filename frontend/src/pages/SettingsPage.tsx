import React from 'react';

const SettingsPage: React.FC = () => (
  <div className="settings-page">
    <h2>Settings</h2>
    <div className="settings-section">
      <p className="settings-section-title">Nothing to configure yet.</p>
    </div>
  </div>
);

export default SettingsPage;
