export const keys = {
  content: (sha256: string) => `content:${sha256}`,
  contentFields: (sha256: string) => `content:${sha256}:fields`,
  stages: (sha256: string) => `content:${sha256}:stages`,
  settled: (sha256: string) => `content:${sha256}:settled`,
  waiting: (sha256: string) => `content:${sha256}:waiting`,
  upload: (imageId: string) => `upload:${imageId}`,
  uploads: () => "uploads",
  outcome: (imageId: string) => `outcome:${imageId}`,
  outcomes: () => "outcomes",
};
