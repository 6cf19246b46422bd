/**
 * Keyword trend scoring types
 *
 * Result field names are snake_case: they are the schema external caches
 * round-trip (see schemas/engine_result.v1.schema.json).
 */

export type RawTimestamp = Date | string | number;

// Raw sample as handed over by a trends collaborator
export interface RawTimePoint {
  timestamp: RawTimestamp;
  value: unknown;
}

export interface TimePoint {
  timestamp: Date;
  value: number;
}

export type Series = TimePoint[];

export interface RisingQuery {
  query: string;
  value: number | string; // growth %, or the upstream "Breakout" sentinel
}

export interface AuxiliarySignals {
  rising_queries?: number | RisingQuery[];
  related_growth_pct?: number;
  news_volume?: number;
}

export interface ResolvedAuxiliarySignals {
  rising_queries: number;
  related_growth_pct: number;
  news_volume: number;
}

export type OpportunityLabel = 'Emerging' | 'Star' | 'Established' | 'Niche';

export type LifecycleStage = 'Introduction' | 'Growth' | 'Maturity' | 'Decline';

export type ScoreTier = 'High' | 'Medium' | 'Low' | 'Very Low';

export type ScoreGrade = 'A+' | 'A' | 'B+' | 'B' | 'C+' | 'C' | 'D' | 'F';

export type TrendComponent = 'level' | 'growth' | 'momentum' | 'consistency';

export type PotentialComponent = 'acceleration' | 'early_stage' | 'rising_queries' | 'headroom';

export interface ScoreResult<K extends string = string> {
  score: number; // integer 0-100
  grade: ScoreGrade;
  breakdown: Record<K, number>; // weighted contributions, sum to score
  components: Record<K, number>; // raw sub-scores 0-100
  insufficient_data: boolean;
  explanation: string;
}

export type TrendScoreResult = ScoreResult<TrendComponent>;
export type PotentialScoreResult = ScoreResult<PotentialComponent>;

export interface NextPeak {
  month: number; // 1-12
  months_until: number; // 1-12
}

export interface SeasonalityProfile {
  is_seasonal: boolean;
  peak_months: number[];
  trough_month: number | null;
  amplitude: number;
  monthly_pattern: Record<string, number>; // "1".."12" -> % deviation from overall mean
  next_peak: NextPeak | null;
}

export interface OpportunityLevel {
  tier: ScoreTier;
  combined_score: number;
  action: string;
}

export interface TrendMetricsSummary {
  current_value: number;
  avg_value: number;
  peak_value: number;
  growth_rate_pct: number;
  momentum_pct: number;
  acceleration_pct: number;
  coefficient_of_variation: number;
}

export type DataWarning =
  | 'dropped_samples'
  | 'clamped_negative'
  | 'breakout_saturated'
  | 'duplicate_period'
  | 'insufficient_data'
  | 'degenerate_all_zero'
  | 'degenerate_constant';

export interface DataQualityReport {
  samples: number;
  dropped: number;
  insufficient_data: boolean;
  warnings: DataWarning[];
}

export interface EngineResult {
  as_of: string | null; // yyyy-MM-dd of the latest sample
  trend: TrendScoreResult;
  potential: PotentialScoreResult;
  seasonality: SeasonalityProfile;
  opportunity: OpportunityLabel;
  lifecycle: LifecycleStage;
  tiers: {
    trend: ScoreTier;
    potential: ScoreTier;
  };
  opportunity_level: OpportunityLevel;
  metrics: TrendMetricsSummary;
  auxiliary: ResolvedAuxiliarySignals;
  data_quality: DataQualityReport;
}
