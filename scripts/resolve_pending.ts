import { loadConfig } from "@/lib/config";
import { pipelineLock } from "@/lib/lock";
import { openRuntime } from "@/lib/runtime";
import { withErrorHandling } from "./validation";

// Usage: tsx scripts/resolve_pending.ts [pais-hint]
// Re-runs geolocation over every incident still missing coordinates.
const COUNTRY_HINT = process.argv[2] || null;

async function main() {
  const config = loadConfig();

  const result = await withErrorHandling(async () => {
    const runtime = await openRuntime(config);
    try {
      const pending = runtime.store.pending(config.geocoder.maxAttempts).length;
      console.log(`📊 ${pending} incidents pending geolocation`);
      const resolved = await pipelineLock.run(() => runtime.registrar.resolvePending(COUNTRY_HINT));
      console.log(`✅ Resolved ${resolved}/${pending}`);
      return resolved;
    } finally {
      runtime.close();
    }
  }, "Pending resolution");

  if (!result.success) {
    console.error("❌ Pending resolution failed with errors:", result.errors);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("❌ resolve_pending failed:", err);
  process.exit(1);
});
