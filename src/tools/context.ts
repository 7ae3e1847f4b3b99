import type { ServerConfig } from '../config';
import type { FontResolver } from '../services/font-resolver';

export interface ToolContext {
  config: ServerConfig;
  fonts: FontResolver;
}
