/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DIALOG_STATE_DEBUG?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
