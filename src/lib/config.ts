import { z } from 'zod';

const ServerEnv = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),
  OS_PLACES_API_KEY: z.string().min(1),
  OS_PLACES_URL: z.string().url().default('https://api.os.uk/search/places/v1/find'),
  GEODATA_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(600),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type ServerConfig = z.infer<typeof ServerEnv>;

let cached: ServerConfig | null = null;

/**
 * Server-side configuration, validated on first use.
 * Throws with the names of the missing or malformed variables.
 */
export function getServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  if (cached && env === process.env) return cached;

  const parsed = ServerEnv.safeParse(env);
  if (!parsed.success) {
    const names = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(
      `Missing or invalid server environment variables: ${names}. ` +
      'Please set them in .env.local (see .env.example)'
    );
  }

  if (env === process.env) cached = parsed.data;
  return parsed.data;
}

/**
 * Key for the raster basemap tiles. Exposed to the browser, so it must be a
 * NEXT_PUBLIC_ variable; Next inlines it at build time.
 */
export function getTileApiKey(): string | null {
  return process.env.NEXT_PUBLIC_OS_MAPS_API_KEY || null;
}
