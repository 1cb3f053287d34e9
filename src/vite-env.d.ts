/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_CURRENCY_SYMBOL?: string;
  readonly VITE_SPRING_DURATION?: string;
  readonly VITE_SPRING_EXTRA_BOUNCE?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
