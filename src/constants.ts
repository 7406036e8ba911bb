export const DWAR_INFO = 'dwar_info' as const;
export const DWAR_LOAD = 'dwar_load' as const;
export const DWAR_CONVERT = 'dwar_convert' as const;

export type DwarToolName =
  | typeof DWAR_INFO
  | typeof DWAR_LOAD
  | typeof DWAR_CONVERT;

export const SERVER_NAME = 'dwar-mcp';
export const SERVER_VERSION = '0.1.0';
