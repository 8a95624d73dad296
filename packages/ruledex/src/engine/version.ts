export const RULEDEX_VERSION = "0.1.0";
