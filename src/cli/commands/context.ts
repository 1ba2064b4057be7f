import type { SiteConfig } from '../../config/index.js';
import type { CliIO } from '../io.js';

export interface CommandContext {
  config: SiteConfig;
  io: CliIO;
  json: boolean;
  force: boolean;
}
