import React from 'react';
import ReactDOM from 'react-dom/client';
import { BrowserRouter } from 'react-router-dom';
import App from './App';
import { createLogger } from './utils/logger';

const log = createLogger('main');

const container = document.getElementById('root');
if (!container) {
  log.error('#root not found');
} else {
  ReactDOM.createRoot(container).render(
    <React.StrictMode>
      <BrowserRouter>
        <App />
      </BrowserRouter>
    </React.StrictMode>
  );
}
