import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import { clampUnit, roundTo } from "../shared/numbers.js";
import { canSupply } from "./backup-supplier.js";
import { getBackupSuppliers } from "./catalog.js";
import {
  AlternativeRecommendations,
  BACKUP_STATUS_BONUS,
  type AlternativeRecommendation
} from "./constants.js";
import type { AlternativeQuery, BackupSupplier, SupplierAlternative } from "./types.js";

export interface SupplierEvaluatorOptions {
  backupSuppliers?: readonly BackupSupplier[];
  logger?: Logger;
}

const SCORE_WEIGHTS = Object.freeze({
  categoryMatch: 0.3,
  quality: 0.25,
  capacity: 0.2,
  leadTime: 0.15,
  cost: 0.1
});

export function categoryMatchRatio(
  supplier: BackupSupplier,
  requiredCategories: readonly string[]
): number {
  const required = requiredCategories
    .map((category) => category.trim().toLowerCase())
    .filter((category) => category !== "");
  if (required.length === 0) {
    return 0.5;
  }
  const matched = required.filter((category) => canSupply(supplier, category)).length;
  return matched / required.length;
}

/** 1 at ten days, 0 at thirty; shorter lead times score above 1. */
export function leadTimeFactor(leadTimeDays: number): number {
  return Math.max(0, 1 - (leadTimeDays - 10) / 20);
}

export function costFactor(costPremiumPercent: number): number {
  return Math.max(0, 1 - costPremiumPercent / 30);
}

export function recommendationFor(score: number): AlternativeRecommendation {
  if (score >= 0.8) {
    return AlternativeRecommendations.HIGHLY_RECOMMENDED;
  }
  if (score >= 0.65) {
    return AlternativeRecommendations.RECOMMENDED;
  }
  if (score >= 0.5) {
    return AlternativeRecommendations.ACCEPTABLE;
  }
  return AlternativeRecommendations.MARGINAL;
}

export class SupplierEvaluator {
  private readonly backupSuppliers: readonly BackupSupplier[];
  private readonly logger: Logger;

  constructor({
    backupSuppliers = getBackupSuppliers(),
    logger = createNoopLogger()
  }: SupplierEvaluatorOptions = {}) {
    this.backupSuppliers = backupSuppliers;
    this.logger = logger;
  }

  get supplierCount(): number {
    return this.backupSuppliers.length;
  }

  scoreAlternative(
    supplier: BackupSupplier,
    categoryMatch: number
  ): number {
    const score =
      SCORE_WEIGHTS.categoryMatch * categoryMatch +
      SCORE_WEIGHTS.quality * supplier.quality_score +
      SCORE_WEIGHTS.capacity * supplier.capacity_score +
      SCORE_WEIGHTS.leadTime * leadTimeFactor(supplier.lead_time_days) +
      SCORE_WEIGHTS.cost * costFactor(supplier.cost_premium_percent) +
      BACKUP_STATUS_BONUS[supplier.status];
    return clampUnit(score);
  }

  findAlternatives({
    requiredCategories = [],
    affectedCountry = null,
    maxLeadTimeDays = 30,
    minQualityScore = 0.7,
    limit = 5
  }: AlternativeQuery = {}): SupplierAlternative[] {
    const excludedCountry = affectedCountry?.trim().toLowerCase() ?? "";
    const alternatives: SupplierAlternative[] = [];

    for (const supplier of this.backupSuppliers) {
      if (excludedCountry !== "" && supplier.country.toLowerCase() === excludedCountry) {
        continue;
      }
      if (supplier.quality_score < minQualityScore) {
        continue;
      }
      if (supplier.lead_time_days > maxLeadTimeDays) {
        continue;
      }
      const categoryMatch = categoryMatchRatio(supplier, requiredCategories);
      if (categoryMatch === 0) {
        continue;
      }

      const score = roundTo(this.scoreAlternative(supplier, categoryMatch), 3);
      alternatives.push({
        supplier,
        score,
        category_match: roundTo(categoryMatch, 3),
        recommendation: recommendationFor(score)
      });
    }

    alternatives.sort((left, right) => right.score - left.score);
    const selected = alternatives.slice(0, Math.max(0, limit));

    this.logger.debug("backup alternatives evaluated", {
      required_categories: [...requiredCategories],
      excluded_country: affectedCountry,
      candidates: alternatives.length,
      selected: selected.length
    });
    return selected;
  }
}
