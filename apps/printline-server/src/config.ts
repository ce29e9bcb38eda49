export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  /** Submissions allowed per client inside the window; 0 disables the limit */
  submitRateLimit: number;
  submitRateWindowMs: number;
  /** Passed to Fastify; decides whether X-Forwarded-For sets the client address */
  trustProxy: boolean | number | string;
  feedTitle: string;
  /** Public URL of the site, used for links in the Atom feed */
  publicUrl: string;
}

const port = parseInt(process.env.PORT ?? "8080", 10);
const host = process.env.HOST ?? "0.0.0.0";

// "true"/"false", a hop count, or a comma-separated list of proxy addresses
function parseTrustProxy(raw: string | undefined): boolean | number | string {
  const value = raw?.trim();
  if (!value || value === "false") return false;
  if (value === "true") return true;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

const config: ServerConfig = {
  port,
  host,
  dataDir: process.env.DATA_DIR ?? "./data",
  submitRateLimit: parseInt(process.env.SUBMIT_RATE_LIMIT ?? "0", 10),
  submitRateWindowMs: parseInt(process.env.SUBMIT_RATE_WINDOW_MS ?? "60000", 10),
  trustProxy: parseTrustProxy(process.env.TRUST_PROXY),
  feedTitle: process.env.FEED_TITLE ?? "Printline",
  publicUrl: process.env.PUBLIC_URL?.trim() || `http://${host}:${port}`,
};

export default config;
