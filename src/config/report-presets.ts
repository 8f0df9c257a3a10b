/**
 * @fileoverview Report Preset Service
 *
 * Holds the metric and entity vocabularies for the funnel exports. Each
 * preset is a self-contained pivot configuration plus the sheet names the
 * source and sink use.
 */

import { Logger } from "../utils/logger";
import { validatePivotConfig } from "../transformation/pivot-transformer";
import type { PivotConfig } from "../types/report";

/**
 * A named, ready-to-run report configuration
 */
export interface ReportPreset {
  /** Preset name used on the command line */
  name: string;
  /** Title shown in CLI banners */
  title: string;
  /** Worksheet the export is read from */
  inputSheetName: string;
  /** Worksheet the report is written to */
  outputSheetName: string;
  pivot: PivotConfig;
}

/**
 * Funnel metrics, in report row order. Shared by every preset.
 */
export const FUNNEL_METRICS: readonly string[] = [
  "[TopLine_Revenue]",
  "[Base_usuarios]",
  "[v_Activaciones_Revenue]",
  "[v__Activaciones]",
  "[v_Renovaciones_Revenue]",
  "[v_Renovaciones]",
  "[v_Rfnds]",
  "[Rfnds_U_U]",
  "[Total_Refnds]",
  "[v__Churn_from_act2]",
  "[v__Chur_prev_base]",
  "[v__Churn]",
  "[v_Auto_Ref]",
  "[Auto_Ref_UU]",
  "[Automatic_Refund_Amount]",
  "[v_Reg_Ref]",
  "[Reg_Ref_UU]",
  "[Reg_Refund_Amount]",
];

const CATEGORY_PRESET: ReportPreset = {
  name: "category",
  title: "CATEGORY REPORT GENERATOR",
  inputSheetName: "Export",
  outputSheetName: "Category Report",
  pivot: {
    keyColumn: "Master_CPC[TME Category]",
    metricOrder: FUNNEL_METRICS,
    entityOrder: [
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
    ],
    derivedColumn: {
      name: "Edu+Img",
      sourceA: "Education",
      sourceB: "Images",
      insertAfter: "Images",
    },
  },
};

const SERVICES_PRESET: ReportPreset = {
  name: "services",
  title: "SERVICES DATA TRANSFORMATION",
  inputSheetName: "Export",
  outputSheetName: "Services Report",
  pivot: {
    keyColumn: "Master_CPC[Service Name]",
    metricOrder: FUNNEL_METRICS,
    entityOrder: [
      "IntimaX",
      "Rincon Prohibido",
      "The Tourist",
      "El Mundo Al Revés",
      "Noticias Emocion",
      "Deportes emocion",
      "Cuidate Mejor",
      "Sexducate con LB",
      "Yo Mujer y +",
      "Slow Life",
      "Movistar Juegos",
      "Kids Play",
      "Smile & Learn",
    ],
  },
};

const BUILT_IN_PRESETS: readonly ReportPreset[] = [
  CATEGORY_PRESET,
  SERVICES_PRESET,
];

/**
 * Deep copy so callers can never mutate a registered preset
 */
function clonePreset(preset: ReportPreset): ReportPreset {
  const { derivedColumn } = preset.pivot;
  return {
    ...preset,
    pivot: {
      keyColumn: preset.pivot.keyColumn,
      metricOrder: [...preset.pivot.metricOrder],
      entityOrder: [...preset.pivot.entityOrder],
      ...(derivedColumn ? { derivedColumn: { ...derivedColumn } } : {}),
    },
  };
}

/**
 * Lookup and registration of report presets
 */
export class ReportPresetService {
  private readonly presets = new Map<string, ReportPreset>();
  private readonly logger: Logger;

  constructor(
    presets: readonly ReportPreset[] = BUILT_IN_PRESETS,
    logger?: Logger,
  ) {
    this.logger = logger || new Logger("ReportPresetService");
    for (const preset of presets) {
      this.presets.set(this.normalizeName(preset.name), clonePreset(preset));
    }
  }

  /**
   * Normalize preset name for consistent lookup
   */
  private normalizeName(name: string): string {
    return name.toLowerCase().trim();
  }

  /**
   * Get a preset by name, case-insensitively
   *
   * @returns A private copy of the preset, or null if not found
   */
  public getPreset(name: string): ReportPreset | null {
    const preset = this.presets.get(this.normalizeName(name));

    if (!preset) {
      this.logger.warn("Report preset not found", {
        preset: name,
        availablePresets: this.getPresetNames(),
      });
      return null;
    }

    return clonePreset(preset);
  }

  public hasPreset(name: string): boolean {
    return this.presets.has(this.normalizeName(name));
  }

  public getPresetNames(): string[] {
    return Array.from(this.presets.values()).map((preset) => preset.name);
  }

  public getAllPresets(): ReportPreset[] {
    return Array.from(this.presets.values()).map(clonePreset);
  }

  /**
   * Add or replace a preset after validating its pivot configuration
   *
   * @throws {ConfigurationError} When the pivot configuration is invalid
   */
  public registerPreset(preset: ReportPreset): void {
    validatePivotConfig(preset.pivot, `preset-${preset.name}`);
    this.presets.set(this.normalizeName(preset.name), clonePreset(preset));

    this.logger.info("Report preset registered", {
      preset: preset.name,
      metricCount: preset.pivot.metricOrder.length,
      entityCount: preset.pivot.entityOrder.length,
    });
  }
}

/**
 * Singleton instance of ReportPresetService
 */
let presetServiceInstance: ReportPresetService | null = null;

/**
 * Get the shared ReportPresetService holding the built-in presets
 */
export function getReportPresetService(): ReportPresetService {
  if (!presetServiceInstance) {
    presetServiceInstance = new ReportPresetService();
  }
  return presetServiceInstance;
}
