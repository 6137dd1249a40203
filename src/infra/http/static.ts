import express from 'express';
import { fileURLToPath } from 'url';

/** `web/public` at the repository root, whether running from src/ or dist/. */
export const STATIC_DIR = fileURLToPath(new URL('../../../web/public', import.meta.url));

export function staticAssets() {
  return express.static(STATIC_DIR, { index: false });
}
