import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  getIdMapPath,
  getOutcomesPath,
  getRunOutcomesPath,
  getRunSummaryPath,
  getSummaryPath,
  subjectSlug,
} from "./paths.js";

describe("Path Resolution Utilities", () => {
  const reportDir = "/data/reports/run1";

  describe("subjectSlug", () => {
    it("should keep simple symbols as they are", () => {
      expect(subjectSlug("IL19")).toBe("IL19");
      expect(subjectSlug("camkk1")).toBe("camkk1");
    });

    it("should transliterate non-ASCII letters", () => {
      expect(subjectSlug("IL-1β")).toBe("IL-1b");
    });

    it("should collapse unsafe characters into underscores", () => {
      expect(subjectSlug("tumor necrosis/factor")).toBe("tumor_necrosis_factor");
      expect(subjectSlug(" EGFR ")).toBe("EGFR");
    });

    it("should fall back when nothing usable remains", () => {
      expect(subjectSlug("///")).toBe("subject");
    });
  });

  describe("report paths", () => {
    it("should place per-subject files under the report directory", () => {
      expect(getOutcomesPath(reportDir, "EGFR")).toBe(join(reportDir, "EGFR_outcomes.csv"));
      expect(getIdMapPath(reportDir, "EGFR")).toBe(join(reportDir, "EGFR_id_map.csv"));
      expect(getSummaryPath(reportDir, "EGFR")).toBe(join(reportDir, "EGFR_summary.json"));
    });

    it("should place run-level files under the report directory", () => {
      expect(getRunSummaryPath(reportDir)).toBe(join(reportDir, "run_summary.json"));
      expect(getRunOutcomesPath(reportDir)).toBe(join(reportDir, "run_outcomes.csv"));
    });
  });
});
