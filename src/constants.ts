export const PUMP_PROGRAM_ID = "6EF8rrecthR5Dkzon8Nwu78hRvfCKubJ14M5uBEwF6P";

// Log markers for the create instruction
export const INITIALIZE_MINT_MARKER = "Instruction: InitializeMint2";
export const PROGRAM_DATA_PREFIX = "Program data: ";
// Base64 prefix of a different event emitted in the same transactions
export const EXCLUDED_DATA_PREFIX = "vdt/";

export const NOT_AVAILABLE = "NA";

export const PERSISTED_COLUMNS = [
  "name",
  "symbol",
  "uri",
  "mint",
  "bonding_curve",
  "user",
  "mint_time",
  "image",
  "twitter",
  "telegram",
  "website",
] as const;
