#!/usr/bin/env node
import fs from "fs/promises";
import path from "path";
import { buildLexiconEntries, countWords, formatLexicon, readAnnotationText } from "../receipts/lexiconBuilder";

/**
 * Mines the correction dictionary from labeled annotation files (one `.txt` per receipt,
 * lines of `x1,y1,...,y4,transcription`).
 *
 * Usage:
 *  node dist/scripts/buildLexicon.js --boxDir data/train/box --out assets/lexicon_dictionary.txt --minFreq 2 --maxWords 50000
 */

type Args = Record<string, string | boolean>;

export function parseArgs(argv: string[]): Args {
  const out: Args = {};
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) continue;
    const key = a.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      out[key] = true;
    } else {
      out[key] = next;
      i++;
    }
  }
  return out;
}

function intArg(args: Args, key: string, fallback: number): number {
  const v = args[key];
  if (v === undefined) return fallback;
  const n = Number(v);
  if (!Number.isInteger(n) || n < 0) throw new Error(`--${key} must be a non-negative integer, got ${String(v)}`);
  return n;
}

async function main() {
  const args = parseArgs(process.argv);

  const boxDir = String(args.boxDir ?? "data/train/box");
  const outPath = String(args.out ?? "assets/lexicon_dictionary.txt");
  const minFrequency = intArg(args, "minFreq", 2);
  const maxWords = intArg(args, "maxWords", 50000);

  const files = (await fs.readdir(boxDir)).filter((f) => f.toLowerCase().endsWith(".txt")).sort();
  if (!files.length) throw new Error(`No .txt files found in: ${boxDir}`);

  const counts = new Map<string, number>();
  for (let i = 0; i < files.length; i++) {
    const content = await fs.readFile(path.join(boxDir, files[i]), "utf8");
    countWords([readAnnotationText(content)], counts);
    if ((i + 1) % 200 === 0) console.log(`[buildLexicon] processed ${i + 1}/${files.length} files`);
  }

  const entries = buildLexiconEntries(counts, { minFrequency, maxWords });
  await fs.mkdir(path.dirname(outPath), { recursive: true });
  await fs.writeFile(outPath, formatLexicon(entries), "utf8");

  console.log(`[buildLexicon] unique tokens=${counts.size} kept=${entries.length} (freq >= ${minFrequency}, cap ${maxWords})`);
  console.log(`[buildLexicon] saved ${outPath}`);
}

if (require.main === module) {
  main().catch((e) => {
    console.error("[buildLexicon] failed", e);
    process.exitCode = 1;
  });
}
