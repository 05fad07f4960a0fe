/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_CELL_SIZE?: string
  readonly VITE_LOG_EVENTS?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
