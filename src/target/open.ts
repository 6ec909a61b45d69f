import { readFile, stat } from "node:fs/promises";
import { basename, dirname, extname, resolve } from "node:path";
import { z } from "zod";
import { errnoCode, errorMessage, TargetOpenError } from "../core/errors.js";
import type { Target, VolumeInfo } from "../core/models.js";
import { MountedFileSystem, type Mount } from "../fs/mounted.js";
import { fingerprint } from "./fingerprint.js";

const ManifestSchema = z
  .object({
    name: z.string().min(1).optional(),
    hostname: z.string().min(1).optional(),
    installTime: z
      .string()
      .datetime({ offset: true })
      .transform((s) => new Date(s))
      .optional(),
    mounts: z
      .array(
        z.object({
          mountPoint: z.string().startsWith("/"),
          path: z.string().min(1),
        }),
      )
      .min(1),
  })
  .strict();

export type TargetManifest = z.input<typeof ManifestSchema>;

interface ResolvedSpec {
  name: string;
  mounts: Mount[];
  hostname?: string;
  installTime?: Date;
}

async function readManifest(spec: string): Promise<ResolvedSpec> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(spec, "utf-8"));
  } catch (err) {
    throw new TargetOpenError(spec, `unreadable manifest: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new TargetOpenError(spec, `invalid manifest: ${issues.join("; ")}`);
  }

  const base = dirname(spec);
  return {
    name: parsed.data.name ?? basename(spec, extname(spec)),
    mounts: parsed.data.mounts.map((m) => ({ mountPoint: m.mountPoint, hostPath: resolve(base, m.path) })),
    hostname: parsed.data.hostname,
    installTime: parsed.data.installTime,
  };
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Opens a target given as a directory holding an extracted or mounted tree
 * (mounted at "/"), or as a JSON manifest listing several volumes.
 */
export async function openTarget(spec: string): Promise<Target> {
  let resolved: ResolvedSpec;
  try {
    const stats = await stat(spec);
    if (stats.isDirectory()) {
      resolved = { name: basename(resolve(spec)), mounts: [{ mountPoint: "/", hostPath: resolve(spec) }] };
    } else if (stats.isFile() && extname(spec).toLowerCase() === ".json") {
      resolved = await readManifest(spec);
    } else {
      throw new TargetOpenError(
        spec,
        "disk images are not parsed directly; mount or extract the volumes and pass the directory or a JSON manifest",
      );
    }
  } catch (err) {
    if (err instanceof TargetOpenError) throw err;
    throw new TargetOpenError(spec, errnoCode(err) ?? errorMessage(err), { cause: err });
  }

  const volumes: VolumeInfo[] = [];
  for (const m of resolved.mounts) {
    volumes.push({ mountPoint: m.mountPoint, source: m.hostPath, present: await isDirectory(m.hostPath) });
  }
  if (!volumes.some((v) => v.present)) {
    throw new TargetOpenError(spec, "none of the target's volumes exist");
  }

  const view = new MountedFileSystem(resolved.mounts.filter((_, i) => volumes[i].present));
  const fp = await fingerprint(view);

  return {
    view,
    info: {
      spec,
      name: resolved.name,
      hostname: resolved.hostname ?? fp.hostname,
      version: fp.version,
      layout: fp.layout,
      installTime: resolved.installTime ?? null,
      volumes,
    },
  };
}
