// Fixed journal vocabularies. These back the CHECK constraints on enum columns,
// so changing a list here needs a schema push as well.

export const TRADE_STATES = ["open", "closed", "reviewed", "cancelled", "missed"] as const;

export const TRADE_RESULTS = ["win", "loss", "be"] as const;

export const TRADE_SESSIONS = ["Frankfurt", "LOKZ", "Lunch", "Pre-NY", "NYKZ", "Other"] as const;

export const ANALYSIS_SECTIONS = ["pre", "plan", "post"] as const;

export const EMOTIONAL_PROBLEMS = [
  "emotional management",
  "premature exit",
  "fear of entry",
] as const;

// Thumbs down / thumbs up
export const ESTIMATIONS = [0, 1] as const;

// Shown by the result select before the user picks a value
export const RESULT_PLACEHOLDER = "— Not set —";

export const RISK_PCT_MIN = 0.5;
export const RISK_PCT_MAX = 2.0;
export const RISK_PCT_STEP = 0.1;
