/** Raw option values as commander hands them over. */
export type CliOptions = {
  extensions?: string;
  maxFileSize?: string;
  verbose?: boolean;
  json?: boolean;
};
