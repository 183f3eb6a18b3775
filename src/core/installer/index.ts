export type { Installer } from './types.js';
