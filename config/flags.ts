export const FLAGS = {
  responseCache: true,
  requestLog: true,
} as const;
