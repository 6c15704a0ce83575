// Configuration constants for the Mafia client

// Shown in the header and as the document title
export const APP_TITLE = import.meta.env.VITE_APP_TITLE || 'Mafia';

// External rules page linked from the info page
export const RULES_URL =
  import.meta.env.VITE_RULES_URL || 'https://en.wikipedia.org/wiki/Mafia_(party_game)';

// Debug logging is off unless VITE_LOG_DEBUG=1
export const LOG_DEBUG = import.meta.env.VITE_LOG_DEBUG === '1';
