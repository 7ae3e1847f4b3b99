import { fileURLToPath } from 'url';
import { z } from 'zod';

export const BUNDLED_FONTS_DIR = fileURLToPath(new URL('../fonts', import.meta.url));

const envSchema = z.object({
  HERSHEY_FONTS_DIR: z.string().min(1).default(BUNDLED_FONTS_DIR),
  HERSHEY_DEFAULT_FONT: z.string().min(1).default('futural'),
  HERSHEY_DEFAULT_SIZE: z.coerce.number().positive().default(32),
});

export interface ServerConfig {
  /** Directory the `.jhf` fonts are listed from. */
  fontsDir: string;
  /** Font listed first, used when a request names none. */
  defaultFont: string;
  /** Cap-to-bottom height of rendered text in output units. */
  defaultSize: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return {
    fontsDir: result.data.HERSHEY_FONTS_DIR,
    defaultFont: result.data.HERSHEY_DEFAULT_FONT,
    defaultSize: result.data.HERSHEY_DEFAULT_SIZE,
  };
}
