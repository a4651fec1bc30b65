/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_AIRPORTS_URL?: string;
  readonly VITE_AIRPORTS_METADATA_URL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
