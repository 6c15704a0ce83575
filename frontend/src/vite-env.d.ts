/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_APP_TITLE?: string;
  readonly VITE_RULES_URL?: string;
  readonly VITE_LOG_DEBUG?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
