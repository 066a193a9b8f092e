import { z } from "zod";

// Payloads of the `action`, `sources` and `repoSources` events. Each record
// keeps its known fields typed and every other key in `extra`.

export interface ActionRecord {
  type: number;
  extra: Record<string, unknown>;
}

export interface SourceRecord {
  title?: string;
  url?: string;
  extra: Record<string, unknown>;
}

export interface RepoSourceRecord {
  repo?: string;
  filePath?: string;
  extra: Record<string, unknown>;
}

const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

const actionSchema = z
  .object({ type: z.number().int().nonnegative() })
  .passthrough()
  .transform(({ type, ...extra }): ActionRecord => ({ type, extra }));

const sourceSchema = z
  .object({ title: optionalText, url: optionalText })
  .passthrough()
  .transform(({ title, url, ...extra }): SourceRecord => ({ title, url, extra }));

const repoSourceSchema = z
  .object({ repo: optionalText, filePath: optionalText })
  .passthrough()
  .transform(({ repo, filePath, ...extra }): RepoSourceRecord => ({ repo, filePath, extra }));

export type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

function parseJson<T>(data: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseResult<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (e) {
    return { ok: false, reason: `invalid JSON (${e instanceof Error ? e.message : String(e)})` };
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
    return { ok: false, reason: issues.join("; ") };
  }
  return { ok: true, value: result.data };
}

export function parseAction(data: string): ParseResult<ActionRecord> {
  return parseJson(data, actionSchema);
}

export function parseSources(data: string): ParseResult<SourceRecord[]> {
  return parseJson(data, z.array(sourceSchema));
}

export function parseRepoSources(data: string): ParseResult<RepoSourceRecord[]> {
  return parseJson(data, z.array(repoSourceSchema));
}
