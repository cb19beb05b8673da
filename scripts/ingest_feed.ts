import { loadConfig } from "@/lib/config";
import { isDayString, opdayToday } from "@/lib/opday";
import { runFeedIngest } from "@/lib/pipeline";
import { feedPath, openRuntime, readFeed } from "@/lib/runtime";
import { withErrorHandling } from "./validation";

// Usage: tsx scripts/ingest_feed.ts <pais> [YYYY-MM-DD]
const PAIS = process.argv[2];
const DAY_ARG = process.argv[3];

async function main() {
  if (!PAIS) {
    console.error("❌ Usage: tsx scripts/ingest_feed.ts <pais> [YYYY-MM-DD]");
    process.exit(1);
  }
  const config = loadConfig();
  const day = DAY_ARG || opdayToday(config.timezone);
  if (!isDayString(day)) {
    console.error(`❌ Invalid day "${day}", expected YYYY-MM-DD`);
    process.exit(1);
  }

  const result = await withErrorHandling(async () => {
    const text = await readFeed(config, PAIS, day);
    if (text === null) {
      console.warn(`⚠️  No feed at ${feedPath(config, PAIS, day)}`);
      return null;
    }

    const runtime = await openRuntime(config);
    try {
      const summary = await runFeedIngest({ pais: PAIS, text, registrar: runtime.registrar });
      const pending = runtime.store.pending(config.geocoder.maxAttempts).length;
      console.log(`✅ ${PAIS} ${day}: ${summary.inserted} new incidents from ${summary.entries} entries`);
      if (pending > 0) console.log(`   - Still pending geolocation: ${pending}`);
      return summary;
    } finally {
      runtime.close();
    }
  }, "Feed ingest");

  if (!result.success) {
    console.error("❌ Feed ingest failed with errors:", result.errors);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("❌ ingest_feed failed:", err);
  process.exit(1);
});
