import ora, { type Ora } from "ora";

export function createSpinner(text: string): Ora {
  const isJson = process.env.STYLEPACK_LOG_FORMAT === "json";
  const isQuiet = (process.env.STYLEPACK_LOG_LEVEL ?? "").toLowerCase() === "error";
  return ora({ text, isSilent: isJson || isQuiet }).start();
}
