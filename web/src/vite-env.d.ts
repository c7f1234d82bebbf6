/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_URL?: string;
  readonly VITE_PREFETCH_INTERVAL_MS?: string;
  readonly VITE_PREFETCH_ENABLED?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
