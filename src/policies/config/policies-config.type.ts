export type PoliciesConfig = {
  maxFileSizeMb: number;
  fileRetentionHours: number;
  extractionModelVersion: string;
};
