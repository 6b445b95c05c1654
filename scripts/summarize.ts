import "dotenv/config";
import { DATA_PATH_ENV, DEFAULT_DATA_PATH } from "@/lib/config";
import { loadAndNormalize } from "@/lib/ingest/load";
import { buildSummary } from "@/lib/views/summary";

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  if (value && value.trim().length > 0) {
    return value.trim();
  }
  return undefined;
}

function main(): void {
  const csvPath = process.argv[2] ?? getEnvVar(DATA_PATH_ENV) ?? DEFAULT_DATA_PATH;
  try {
    const table = loadAndNormalize(csvPath);
    const summary = buildSummary(table);
    if (summary.opacity === "absent") {
      console.warn("[summarize] no atmospheric_opacity column found");
    }
    console.log(JSON.stringify(summary, null, 2));
  } catch (e) {
    console.error(`[summarize] ${e instanceof Error ? e.message : String(e)}`);
    process.exitCode = 1;
  }
}

main();
