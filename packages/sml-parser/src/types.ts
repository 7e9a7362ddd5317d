export type ParseOptions = {
  debug?: boolean;
  logger?: (msg: string) => void;
  signal?: AbortSignal; // checked before every token is taken
};
