import { readFile } from "node:fs/promises";
import { join } from "node:path";

export const readPackageVersion = async (): Promise<string> => {
  try {
    const raw = await readFile(join(__dirname, "..", "package.json"), "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object") {
      const version: unknown = Reflect.get(parsed, "version");
      if (typeof version === "string") {
        return version;
      }
    }
    return "dev";
  } catch {
    return "dev";
  }
};
