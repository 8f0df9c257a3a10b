import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  FUNNEL_METRICS,
  ReportPresetService,
  getReportPresetService,
  type ReportPreset,
} from "./report-presets";
import { validatePivotConfig } from "../transformation/pivot-transformer";
import { ConfigurationError } from "../types/errors";

// Mock the logger
vi.mock("../utils/logger", () => ({
  Logger: vi.fn().mockImplementation(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

describe("ReportPresetService", () => {
  let service: ReportPresetService;

  beforeEach(() => {
    service = new ReportPresetService();
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("should provide the built-in presets", () => {
    expect(service.getPresetNames()).toEqual(["category", "services"]);
    expect(service.getAllPresets()).toHaveLength(2);
  });

  it("should look presets up case-insensitively", () => {
    expect(service.getPreset("  CATEGORY ")?.name).toBe("category");
    expect(service.hasPreset("Services")).toBe(true);
  });

  it("should return null for unknown presets", () => {
    expect(service.getPreset("regions")).toBeNull();
    expect(service.hasPreset("regions")).toBe(false);
  });

  it("should describe the category report", () => {
    const preset = service.getPreset("category");

    expect(preset).toMatchObject({
      title: "CATEGORY REPORT GENERATOR",
      inputSheetName: "Export",
      outputSheetName: "Category Report",
    });
    expect(preset?.pivot.keyColumn).toBe("Master_CPC[TME Category]");
    expect(preset?.pivot.metricOrder).toEqual(FUNNEL_METRICS);
    expect(preset?.pivot.entityOrder).toEqual([
      "Beauty and Health",
      "Free Time",
      "Games",
      "Education",
      "Images",
      "Kids",
      "Light",
      "Music",
      "News",
      "Sports",
    ]);
    expect(preset?.pivot.derivedColumn).toEqual({
      name: "Edu+Img",
      sourceA: "Education",
      sourceB: "Images",
      insertAfter: "Images",
    });
  });

  it("should describe the services report", () => {
    const preset = service.getPreset("services");

    expect(preset?.outputSheetName).toBe("Services Report");
    expect(preset?.pivot.keyColumn).toBe("Master_CPC[Service Name]");
    expect(preset?.pivot.entityOrder).toHaveLength(13);
    expect(preset?.pivot.entityOrder[0]).toBe("IntimaX");
    expect(preset?.pivot.entityOrder[12]).toBe("Smile & Learn");
    expect(preset?.pivot.derivedColumn).toBeUndefined();
  });

  it("should track the funnel metrics in report order", () => {
    expect(FUNNEL_METRICS).toHaveLength(18);
    expect(FUNNEL_METRICS[0]).toBe("[TopLine_Revenue]");
    expect(FUNNEL_METRICS[17]).toBe("[Reg_Refund_Amount]");
  });

  it("should ship valid pivot configurations", () => {
    for (const preset of service.getAllPresets()) {
      expect(() => validatePivotConfig(preset.pivot, "test-cid")).not.toThrow();
    }
  });

  it("should hand out independent copies", () => {
    const first = service.getPreset("category");
    const second = service.getPreset("category");

    expect(first).toEqual(second);
    expect(first?.pivot.entityOrder).not.toBe(second?.pivot.entityOrder);
    expect(first?.pivot.derivedColumn).not.toBe(second?.pivot.derivedColumn);
  });

  describe("registerPreset", () => {
    const regionsPreset: ReportPreset = {
      name: "Regions",
      title: "REGIONS REPORT",
      inputSheetName: "Export",
      outputSheetName: "Regions Report",
      pivot: {
        keyColumn: "Region",
        metricOrder: ["[TopLine_Revenue]"],
        entityOrder: ["North", "South"],
      },
    };

    it("should register a valid preset", () => {
      service.registerPreset(regionsPreset);

      expect(service.getPresetNames()).toEqual([
        "category",
        "services",
        "Regions",
      ]);
      expect(service.getPreset("regions")?.pivot.entityOrder).toEqual([
        "North",
        "South",
      ]);
    });

    it("should reject an invalid preset", () => {
      expect(() =>
        service.registerPreset({
          ...regionsPreset,
          pivot: { ...regionsPreset.pivot, entityOrder: ["North", "North"] },
        }),
      ).toThrow(ConfigurationError);
      expect(service.hasPreset("regions")).toBe(false);
    });
  });

  it("should share a single service instance", () => {
    expect(getReportPresetService()).toBe(getReportPresetService());
  });
});
