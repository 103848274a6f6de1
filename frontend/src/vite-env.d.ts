/// <reference types="vite/client" />

interface ImportMetaEnv {
  /** Origin til API-serveren, f.eks. http://localhost:5000. Tom → samme origin (Vite-proxy). */
  readonly VITE_BACKEND_URL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
