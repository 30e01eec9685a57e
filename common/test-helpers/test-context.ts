import * as fs from "fs";

// Load the "context" section of a cdk.json file
export function loadCdkContext(cdkJsonPath: string): Record<string, unknown> {
  try {
    const cdkJsonContent = fs.readFileSync(cdkJsonPath, "utf8");
    const parsed: unknown = JSON.parse(cdkJsonContent);
    if (typeof parsed === "object" && parsed !== null && "context" in parsed) {
      const context: unknown = parsed.context;
      if (typeof context === "object" && context !== null) {
        return Object.fromEntries(Object.entries(context));
      }
    }
    return {};
  } catch (error) {
    console.error("Failed to load cdk.json:", error);
    return {};
  }
}
