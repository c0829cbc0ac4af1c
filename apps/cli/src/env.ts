import { existsSync, readFileSync } from "node:fs";

/** Load `.env.local` into process.env without overriding variables already set. */
export function loadEnvFile(path = ".env.local"): void {
  if (!existsSync(path)) return;
  const envContent = readFileSync(path, "utf8");
  for (const line of envContent.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    const val = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
    if (!process.env[key]) process.env[key] = val;
  }
}
