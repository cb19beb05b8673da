import { describe, expect, it } from "vitest";
import {
  cleanSummary,
  extractUrls,
  foldText,
  normalizeKey,
  normalizeText,
  removeNoiseLines,
  splitLines,
} from "./normalize";

describe("normalizeText", () => {
  it("strips bullets, emphasis, URLs and hashtags", () => {
    expect(normalizeText("• **Ataque** en Trípoli https://t.me/x/1 #Libia  ")).toBe("Ataque en Trípoli");
  });

  it("returns an empty string for missing input", () => {
    expect(normalizeText(null)).toBe("");
    expect(normalizeText("")).toBe("");
  });

  it("converts HTML to text and drops scripts", () => {
    expect(normalizeText("<p>Explosión en <b>Misrata</b></p><script>track()</script>")).toBe(
      "Explosión en Misrata",
    );
  });

  it("removes install-banner noise lines", () => {
    expect(normalizeText("Install PWA using Add to Home Screen\nTiroteo en Zawiya.")).toBe("Tiroteo en Zawiya.");
  });

  it("keeps a trailing period but not a leading one", () => {
    expect(normalizeText("... Enfrentamientos en Sirte.")).toBe("Enfrentamientos en Sirte.");
  });
});

describe("cleanSummary", () => {
  it("drops attribution lines and keeps two sentences", () => {
    expect(cleanSummary("Primera frase. Segunda frase! Tercera?\nvia @canal")).toBe("Primera frase. Segunda frase!");
  });

  it("caps the length with an ellipsis", () => {
    const out = cleanSummary("a".repeat(700));
    expect(out).toHaveLength(600);
    expect(out.endsWith("...")).toBe(true);
  });
});

describe("helpers", () => {
  it("extracts URLs without trailing punctuation", () => {
    expect(extractUrls("ver https://t.me/canal/12). y www.ejemplo.com,")).toEqual([
      "https://t.me/canal/12",
      "www.ejemplo.com",
    ]);
  });

  it("splits on any line ending without a trailing empty line", () => {
    expect(splitLines("a\r\nb\rc\n")).toEqual(["a", "b", "c"]);
    expect(splitLines("")).toEqual([]);
  });

  it("builds lowercased whitespace-collapsed keys", () => {
    expect(normalizeKey("  Hola ", "MUNDO ")).toBe("hola mundo");
  });

  it("folds diacritics and case", () => {
    expect(foldText("Trípoli")).toBe("tripoli");
  });

  it("leaves text without noise untouched", () => {
    expect(removeNoiseLines("uno\ndos")).toBe("uno\ndos");
  });
});
