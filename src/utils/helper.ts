import { access } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

/** 展開開頭的 ~，其餘路徑轉為絕對路徑 */
export function expandHome(p: string) {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return path.resolve(p);
}

/** 詢問使用者是否繼續，只接受 y / yes */
export async function confirm(question: string) {
  const rl = createInterface({ input, output });
  try {
    const answer = await rl.question(question);
    return ["y", "yes"].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}

export async function exists(p: string) {
  return access(p).then(
    () => true,
    () => false
  );
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
