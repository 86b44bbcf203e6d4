import YAML from "yaml";
import * as z from "zod/v4";
import { SpecUnavailableError, errorMessage } from "../core/errors.js";

export const ENV_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

const DependencySchema = z.union([z.string().min(1), z.object({ pip: z.array(z.string().min(1)) })]);

const EnvironmentSpecSchema = z.object({
  name: z.string().regex(ENV_NAME_PATTERN, "name must be a plain environment name"),
  channels: z.array(z.string().min(1)).default([]),
  dependencies: z.array(DependencySchema).default([]),
  prefix: z.string().optional()
});

export type EnvironmentDependency = z.infer<typeof DependencySchema>;

export interface EnvironmentSpec {
  name: string;
  channels: string[];
  dependencies: EnvironmentDependency[];
  /** The exact bytes that were fingerprinted. */
  bytes: Buffer;
  sourcePath: string | null;
}

export function parseEnvironmentSpec(bytes: Buffer, sourcePath: string | null = null): EnvironmentSpec {
  const where = sourcePath ?? "environment spec";
  let doc: unknown;
  try {
    doc = YAML.parse(bytes.toString("utf8"));
  } catch (err) {
    throw new SpecUnavailableError(`${where} is not valid YAML: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = EnvironmentSpecSchema.safeParse(doc);
  if (!parsed.success) {
    throw new SpecUnavailableError(`${where} is not a usable environment spec: ${z.prettifyError(parsed.error)}`);
  }

  return {
    name: parsed.data.name,
    channels: parsed.data.channels,
    dependencies: parsed.data.dependencies,
    bytes,
    sourcePath
  };
}

export function condaPackages(spec: EnvironmentSpec): string[] {
  return spec.dependencies.filter((d): d is string => typeof d === "string");
}

export function pipPackages(spec: EnvironmentSpec): string[] {
  return spec.dependencies.flatMap((d) => (typeof d === "string" ? [] : d.pip));
}
