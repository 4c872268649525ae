import fs from "fs";
import path from "path";
import { z } from "zod";
import { DEFAULT_MODEL_PATH } from "./constants.js";
import { CliError, ModelDownloadError, UsageError } from "./errors.js";
import { Logger, silentLogger } from "./logger.js";
import { ensureDir } from "./utils.js";

export type ModelFile = {
  name: string;
  sizeBytes: number;
};

/** CivitAI model type (lowercased) to its folder under `models/`. */
export const MODEL_TYPE_DIRS: Readonly<Record<string, string>> = {
  lora: "loras",
  hypernetwork: "hypernetworks",
  checkpoint: "checkpoints",
  textualinversion: "embeddings",
  controlnet: "controlnet",
};

export function modelDir(appDir: string, relativePath: string = DEFAULT_MODEL_PATH): string {
  return path.resolve(appDir, relativePath);
}

/**
 * Files directly inside `dir`, sorted by name. A missing directory has none.
 */
export function listModels(dir: string): ModelFile[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => ({
      name: entry.name,
      sizeBytes: fs.statSync(path.join(dir, entry.name)).size,
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

export function formatModelTable(models: ModelFile[]): string {
  if (models.length === 0) {
    return "No models found.";
  }
  const rows: Array<[string, string]> = [
    ["Model Name", "Size"],
    ...models.map((model): [string, string] => [model.name, `${Math.floor(model.sizeBytes / 1024)} KB`]),
  ];
  const width = Math.max(...rows.map(([name]) => name.length));
  return rows.map(([name, size]) => `${name.padEnd(width)}  ${size}`).join("\n");
}

export type RemoveResult = {
  deleted: string[];
  missing: string[];
  canceled: boolean;
};

/**
 * Deletes the named files from `dir`. Nothing is deleted unless `confirm` is set.
 */
export function removeModels(dir: string, names: readonly string[], confirm: boolean): RemoveResult {
  const found: string[] = [];
  const missing: string[] = [];
  for (const name of names) {
    if (!name || path.basename(name) !== name) {
      throw new UsageError(`Invalid model name: ${name}`);
    }
    const target = path.join(dir, name);
    if (fs.existsSync(target) && fs.statSync(target).isFile()) {
      found.push(target);
    } else {
      missing.push(name);
    }
  }

  if (found.length === 0 || !confirm) {
    return { deleted: [], missing, canceled: found.length > 0 };
  }
  for (const target of found) {
    fs.unlinkSync(target);
  }
  return { deleted: found, missing, canceled: false };
}

export type ModelSource =
  | { kind: "civitai-model"; modelId: number; versionId: number | null }
  | { kind: "civitai-version"; versionId: number }
  | { kind: "huggingface"; filename: string }
  | { kind: "unknown" };

const positiveInt = (value: string | undefined): number | null =>
  value !== undefined && /^\d+$/.test(value) ? Number(value) : null;

/**
 * Recognizes CivitAI page and download links and Hugging Face file links.
 */
export function classifyModelUrl(raw: string): ModelSource {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return { kind: "unknown" };
  }
  const segments = url.pathname.split("/").filter(Boolean);
  const host = url.hostname.replace(/^www\./, "");

  if (host === "civitai.com") {
    if (segments[0] === "api" && segments[1] === "download" && segments[2] === "models") {
      const versionId = positiveInt(segments[3]);
      return versionId === null ? { kind: "unknown" } : { kind: "civitai-version", versionId };
    }
    if (segments[0] === "models") {
      const modelId = positiveInt(segments[1]);
      if (modelId === null) {
        return { kind: "unknown" };
      }
      const query = [...url.searchParams.values()];
      if (query.length === 0) {
        return { kind: "civitai-model", modelId, versionId: null };
      }
      const versionId = positiveInt(query[0]);
      return versionId === null ? { kind: "unknown" } : { kind: "civitai-model", modelId, versionId };
    }
    return { kind: "unknown" };
  }

  if (host === "huggingface.co" && segments.length > 0) {
    return { kind: "huggingface", filename: decodeURIComponent(segments[segments.length - 1]) };
  }
  return { kind: "unknown" };
}

const CivitaiFileSchema = z.object({
  name: z.string(),
  downloadUrl: z.string(),
  primary: z.boolean().optional(),
});

const CivitaiVersionSchema = z.object({
  id: z.number(),
  baseModel: z.string(),
  files: z.array(CivitaiFileSchema),
});

const CivitaiModelSchema = z.object({
  type: z.string(),
  modelVersions: z.array(CivitaiVersionSchema),
});

const CivitaiModelVersionSchema = CivitaiVersionSchema.extend({
  model: z.object({ type: z.string() }),
});

export type CivitaiFile = {
  filename: string;
  downloadUrl: string;
  modelType: string;
  baseModel: string;
};

export const CIVITAI_API = "https://civitai.com/api/v1";

type Fetch = typeof fetch;

async function fetchJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  fetchImpl: Fetch,
  headers: Record<string, string>
): Promise<z.infer<S>> {
  const response = await fetchImpl(url, { headers, signal: AbortSignal.timeout(10_000) });
  if (!response.ok) {
    throw new ModelDownloadError(`CivitAI request failed (${response.status}): ${url}`);
  }
  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new ModelDownloadError(`Unexpected CivitAI response from ${url}`);
  }
  return parsed.data;
}

function primaryFile(
  version: z.infer<typeof CivitaiVersionSchema>,
  modelType: string
): CivitaiFile | null {
  const file = version.files.find((candidate) => candidate.primary === true);
  if (!file) {
    return null;
  }
  return {
    filename: file.name,
    downloadUrl: file.downloadUrl,
    modelType: modelType.toLowerCase(),
    baseModel: version.baseModel.replace(/ /g, ""),
  };
}

/**
 * Looks up the primary file of a model version. Without a version id the
 * first listed version is used.
 */
export async function lookupCivitaiFile(
  source: Extract<ModelSource, { kind: "civitai-model" | "civitai-version" }>,
  options: { fetchImpl?: Fetch; headers?: Record<string, string> } = {}
): Promise<CivitaiFile> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const headers = options.headers ?? {};

  if (source.kind === "civitai-version") {
    const version = await fetchJson(
      `${CIVITAI_API}/model-versions/${source.versionId}`,
      CivitaiModelVersionSchema,
      fetchImpl,
      headers
    );
    const file = primaryFile(version, version.model.type);
    if (!file) {
      throw new ModelDownloadError(`No primary file for model version ${source.versionId}.`);
    }
    return file;
  }

  const model = await fetchJson(
    `${CIVITAI_API}/models/${source.modelId}`,
    CivitaiModelSchema,
    fetchImpl,
    headers
  );
  const versionId = source.versionId ?? model.modelVersions[0]?.id;
  const version = model.modelVersions.find((candidate) => candidate.id === versionId);
  const file = version ? primaryFile(version, model.type) : null;
  if (!file) {
    throw new ModelDownloadError(`Version ID ${versionId} not found for model ID ${source.modelId}`);
  }
  return file;
}

export function describeDownloadFailure(status: number): string {
  switch (status) {
    case 401:
      return (
        `Unauthorized download (${status}). ` +
        "Set a CivitAI API token with 'comfy model download --set-civitai-api-token <token>'."
      );
    case 403:
      return `Forbidden url (${status}), you might need to manually log into a browser to download this`;
    case 404:
      return `File not found on server (${status})`;
    default:
      return `Unknown error occurred (status code: ${status})`;
  }
}

/**
 * Streams `url` into `target` through a `.part` file that is renamed once
 * the body is complete.
 */
export async function downloadFile(
  url: string,
  target: string,
  options: { fetchImpl?: Fetch; headers?: Record<string, string> } = {}
): Promise<number> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const response = await fetchImpl(url, { headers: options.headers, redirect: "follow" });
  if (response.status !== 200 || !response.body) {
    throw new ModelDownloadError(`Failed to download file.\n${describeDownloadFailure(response.status)}`);
  }

  ensureDir(path.dirname(target));
  const partial = `${target}.part`;
  const handle = await fs.promises.open(partial, "w");
  let written = 0;
  try {
    const reader = response.body.getReader();
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      await handle.write(value);
      written += value.byteLength;
    }
  } catch (error) {
    await handle.close();
    fs.rmSync(partial, { force: true });
    throw error;
  }
  await handle.close();
  fs.renameSync(partial, target);
  return written;
}

export type DownloadModelOptions = {
  appDir: string;
  url: string;
  relativePath?: string;
  filename?: string;
  civitaiToken?: string;
  fetchImpl?: Fetch;
  logger?: Logger;
};

export type DownloadedModel = {
  path: string;
  bytes: number;
};

export async function downloadModel(options: DownloadModelOptions): Promise<DownloadedModel> {
  const logger = options.logger ?? silentLogger;
  const headers: Record<string, string> = options.civitaiToken
    ? { Authorization: `Bearer ${options.civitaiToken}` }
    : {};
  const source = classifyModelUrl(options.url);

  let url = options.url;
  let filename: string | undefined;
  let relativePath = options.relativePath;

  switch (source.kind) {
    case "civitai-model":
    case "civitai-version": {
      const file = await lookupCivitaiFile(source, { fetchImpl: options.fetchImpl, headers });
      url = file.downloadUrl;
      filename = file.filename;
      const typeDir = MODEL_TYPE_DIRS[file.modelType];
      if (relativePath === undefined) {
        if (typeDir) {
          relativePath = path.join(DEFAULT_MODEL_PATH, typeDir, file.baseModel);
        } else {
          logger.warn(`Unknown model type '${file.modelType}'; saving under ${DEFAULT_MODEL_PATH}.`);
        }
      }
      break;
    }
    case "huggingface":
      filename = source.filename;
      break;
    case "unknown":
      logger.info("Model source is unknown.");
      break;
  }

  filename = options.filename ?? filename;
  if (!filename) {
    throw new UsageError("Cannot tell the file name from this URL. Pass --filename.");
  }
  if (path.basename(filename) !== filename) {
    throw new UsageError(`Invalid file name: ${filename}`);
  }

  const target = path.join(modelDir(options.appDir, relativePath), filename);
  if (fs.existsSync(target)) {
    throw new CliError(`File already exists: ${target}`);
  }

  logger.info(`Start downloading URL: ${url} into ${target}`);
  const bytes = await downloadFile(url, target, { fetchImpl: options.fetchImpl, headers });
  return { path: target, bytes };
}
