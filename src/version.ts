export const TOOL_NAME = "code-auditor";
export const VERSION = "0.1.0";
