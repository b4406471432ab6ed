export const parseNdjson = (payload: string): unknown[] =>
  payload
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line): unknown => JSON.parse(line));
