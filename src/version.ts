export const TOOL_NAME = 'rtl-archcheck';
export const VERSION = '0.1.0';
