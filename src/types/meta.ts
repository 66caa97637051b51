/**
 * Metadata you can attach to errors. Useful for docs and log output.
 */
export interface IMeta {
  title?: string;
  description?: string;
}

export interface IErrorMeta extends IMeta {}
