import { promises as fs } from "node:fs";
import path from "node:path";
import { loadConfig } from "@/lib/config";
import { removeNoiseLines, splitLines } from "@/lib/normalize";
import type { FileChange } from "./types";
import { withErrorHandling } from "./validation";

// Usage: tsx scripts/clean_noise.ts [data_dir] [--dry-run]
// Drops known banner/footer lines (PWA install prompts etc.) from collected .txt feeds.
const args = process.argv.slice(2);
const DRY_RUN = args.includes("--dry-run");
const DATA_DIR = args.find((a) => !a.startsWith("--"));

async function* walkTxt(dir: string): AsyncGenerator<string> {
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) yield* walkTxt(full);
    else if (entry.isFile() && entry.name.endsWith(".txt")) yield full;
  }
}

async function cleanNoiseIn(dir: string, dryRun: boolean): Promise<FileChange[]> {
  const changes: FileChange[] = [];
  for await (const file of walkTxt(dir)) {
    const before = await fs.readFile(file, "utf8");
    const after = removeNoiseLines(before);
    if (after === before) continue;
    changes.push({ file, removedLines: splitLines(before).length - splitLines(after).length });
    if (!dryRun) await fs.writeFile(file, after, "utf8");
  }
  return changes;
}

async function main() {
  const dir = DATA_DIR || loadConfig().dataDir;

  const result = await withErrorHandling(async () => {
    const changes = await cleanNoiseIn(dir, DRY_RUN);
    for (const change of changes) {
      console.log(`${DRY_RUN ? "📊 would clean" : "✅ cleaned"}: ${change.file} (-${change.removedLines} lines)`);
    }
    console.log(`📊 Files changed: ${changes.length}${DRY_RUN ? " (dry run)" : ""}`);
    return changes;
  }, "Noise cleanup");

  if (!result.success) {
    console.error("❌ Noise cleanup failed with errors:", result.errors);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("❌ clean_noise failed:", err);
  process.exit(1);
});
