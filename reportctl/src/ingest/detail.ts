export type DetailImage = {
  title?: string;
  path: string;
};

export type DetailTable = {
  title: string;
  /** [key, value] pairs, sorted by key. */
  rows: Array<[string, string]>;
};

/** Structured detail a test prints on stdout: plots and analysis tables. */
export type CaseDetail = {
  images: DetailImage[];
  tables: DetailTable[];
};

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null || typeof value !== "object") return String(value);
  return JSON.stringify(value);
}

function sortedRows(entries: Iterable<[string, string]>): Array<[string, string]> {
  return [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function imageOf(item: unknown): DetailImage | null {
  if (typeof item === "string") return { path: item };
  if (!isObject(item) || typeof item.path !== "string") return null;
  return typeof item.title === "string" && item.title !== "" ? { title: item.title, path: item.path } : { path: item.path };
}

/**
 * Parse structured detail from captured output.
 *
 * The output qualifies when it is a JSON object with both `result` and
 * `reason`. `plot` lists images (a path, or `{ path, title }`); `analysis`
 * maps keys to scalars or string lists (collected in an "analysis" table) or
 * to objects (one table each). Returns null for anything that does not fit.
 */
export function parseCaseDetail(output: string | undefined): CaseDetail | null {
  if (output === undefined) return null;

  let obj: unknown;
  try {
    obj = JSON.parse(output);
  } catch {
    return null;
  }
  if (!isObject(obj) || !("result" in obj) || !("reason" in obj)) return null;

  const images: DetailImage[] = [];
  const plot = obj.plot ?? [];
  if (!Array.isArray(plot)) return null;
  for (const item of plot) {
    const image = imageOf(item);
    if (!image) return null;
    images.push(image);
  }

  const tables: DetailTable[] = [];
  const analysis = obj.analysis;
  if (analysis !== undefined) {
    if (!isObject(analysis)) return null;
    const scalars = new Map<string, string>();
    for (const [key, value] of Object.entries(analysis)) {
      if (isObject(value)) {
        tables.push({ title: key, rows: sortedRows(Object.entries(value).map(([k, v]): [string, string] => [k, stringify(v)])) });
      } else if (Array.isArray(value)) {
        if (!value.every((v): v is string => typeof v === "string")) return null;
        scalars.set(key, value.join("\n"));
      } else {
        scalars.set(key, stringify(value));
      }
    }
    if (scalars.size > 0) {
      tables.unshift({ title: "analysis", rows: sortedRows(scalars) });
    }
  }

  return { images, tables };
}
