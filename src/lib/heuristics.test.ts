import { describe, expect, it } from "vitest";
import { Gazetteer } from "./gazetteer";
import { heuristicLocation } from "./heuristics";

const libya = Gazetteer.fromCsv(
  ["name,lat,lon", "Tripoli,32.8872,13.1913", "Benghazi,32.1167,20.0667"].join("\n"),
);

describe("heuristicLocation", () => {
  it("picks a known city named in the text", () => {
    expect(heuristicLocation(["Libia"], "Ataque en Bengasi", libya)).toEqual({
      name: "Benghazi",
      lat: 32.1167,
      lon: 20.0667,
    });
  });

  it("falls back to the capital", () => {
    expect(heuristicLocation(["Libya"], "Incidente sin lugar", libya)).toEqual({
      name: "Tripoli",
      lat: 32.8872,
      lon: 13.1913,
    });
  });

  it("needs a gazetteer for the city rule", () => {
    expect(heuristicLocation(["Libia"], "Ataque en Bengasi", null)).toBeNull();
  });

  it("uses fixed points for Gaza", () => {
    expect(heuristicLocation([null, "Gaza Strip"], "Strike on Khan Younis overnight", null)).toEqual({
      name: "Khan Younis",
      lat: 31.34,
      lon: 34.3,
    });
  });

  it("has no rule for other countries", () => {
    expect(heuristicLocation(["Haiti"], "Tripoli", libya)).toBeNull();
  });
});
