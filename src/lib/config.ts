import { z } from "zod";

const EnvSchema = z.object({
  SHIFT_CIPHER_DEBUG: z.string().optional(),
  NO_COLOR: z.string().optional(),
});

export interface CipherConfig {
  debug: boolean;
  color: boolean;
}

/**
 * Runtime settings from the environment. Colour additionally needs a TTY on
 * stdout; callers pass that in so tests stay deterministic.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, isTTY = Boolean(process.stdout.isTTY)): CipherConfig {
  const parsed = EnvSchema.parse(env);
  return {
    debug: parsed.SHIFT_CIPHER_DEBUG === "1",
    color: isTTY && parsed.NO_COLOR === undefined,
  };
}
