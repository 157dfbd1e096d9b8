/**
 * Resforge Runtime Host — Project Descriptor Codec
 *
 * The descriptor is a YAML document written as two blocks, metadata first
 * and the resource map last:
 *
 *   target_type: Earthbound
 *   version: 13
 *   module configuration:
 *     enabled modules:
 *       - common.UsedRangeModule
 *     disabled modules: []
 *     project-specific modules: []
 *   resources:
 *     eb.TextModule:
 *       text: text.yml
 *
 * Every field added after the first format version may be absent. A file
 * without `version` is a version 1 project; a file without the module
 * configuration block predates module configuration.
 */

import * as yaml from 'js-yaml';
import { z } from 'zod';
import { DEFAULT_DESCRIPTOR_VERSION, DescriptorFormatError } from '@resforge/kernel';
import type { ModuleConfigurationRecord, ResourceMap, TargetType } from '@resforge/kernel';

/** Default descriptor filename inside a project directory. */
export const DESCRIPTOR_FILENAME = 'Project.resforge';

// Document keys
const KEY_TARGET_TYPE = 'target_type';
const KEY_VERSION = 'version';
const KEY_MODULE_CONFIGURATION = 'module configuration';
const KEY_ENABLED = 'enabled modules';
const KEY_DISABLED = 'disabled modules';
const KEY_PROJECT_SPECIFIC = 'project-specific modules';
const KEY_RESOURCES = 'resources';

const DUMP_OPTIONS: yaml.DumpOptions = { lineWidth: -1, noRefs: true };

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const nameList = z.array(z.string()).nullish().transform((names) => names ?? []);

const ModuleConfigurationSchema = z
  .object({
    [KEY_ENABLED]: nameList,
    [KEY_DISABLED]: nameList,
    [KEY_PROJECT_SPECIFIC]: nameList,
  })
  .transform(
    (block): ModuleConfigurationRecord => ({
      enabled: block[KEY_ENABLED],
      disabled: block[KEY_DISABLED],
      projectSpecific: block[KEY_PROJECT_SPECIFIC],
    }),
  );

const ResourcesSchema = z
  .record(z.record(z.string()).nullable())
  .nullish()
  .transform((resources): ResourceMap => {
    const map: Record<string, Readonly<Record<string, string>>> = {};
    for (const [moduleName, entries] of Object.entries(resources ?? {})) {
      map[moduleName] = entries ?? {};
    }
    return map;
  });

const DescriptorSchema = z.object({
  [KEY_TARGET_TYPE]: z.string().min(1),
  [KEY_VERSION]: z.number().int().positive().nullish(),
  [KEY_MODULE_CONFIGURATION]: ModuleConfigurationSchema.nullish(),
  [KEY_RESOURCES]: ResourcesSchema,
});

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

/** Decoded contents of a descriptor file. */
export interface DescriptorDocument {
  readonly targetType: TargetType;
  readonly version: number;
  /** Absent in files written before module configuration existed. */
  readonly moduleConfiguration?: ModuleConfigurationRecord | undefined;
  readonly resources: ResourceMap;
}

/**
 * Decode descriptor text.
 *
 * @param descriptorPath - Used in error messages only
 * @throws {DescriptorFormatError} If the text is not YAML or does not match
 *   the descriptor shape
 */
export function decodeDescriptor(text: string, descriptorPath: string): DescriptorDocument {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err: unknown) {
    const reason = err instanceof yaml.YAMLException ? err.reason : String(err);
    throw new DescriptorFormatError(descriptorPath, `not valid YAML (${reason})`);
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new DescriptorFormatError(descriptorPath, 'expected a mapping at the top level');
  }

  const parsed = DescriptorSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue === undefined ? '' : issue.path.join('.');
    throw new DescriptorFormatError(
      descriptorPath,
      `invalid field '${field}': ${issue?.message ?? parsed.error.message}`,
    );
  }

  const data = parsed.data;
  return {
    targetType: data[KEY_TARGET_TYPE],
    version: data[KEY_VERSION] ?? DEFAULT_DESCRIPTOR_VERSION,
    moduleConfiguration: data[KEY_MODULE_CONFIGURATION] ?? undefined,
    resources: data[KEY_RESOURCES],
  };
}

/**
 * Encode a descriptor as two YAML blocks: metadata and module configuration,
 * then resources.
 */
export function encodeDescriptor(
  targetType: TargetType,
  version: number,
  moduleConfiguration: ModuleConfigurationRecord,
  resources: ResourceMap,
): string {
  const head = {
    [KEY_TARGET_TYPE]: targetType,
    [KEY_VERSION]: version,
    [KEY_MODULE_CONFIGURATION]: {
      [KEY_ENABLED]: [...moduleConfiguration.enabled],
      [KEY_DISABLED]: [...moduleConfiguration.disabled],
      [KEY_PROJECT_SPECIFIC]: [...moduleConfiguration.projectSpecific],
    },
  };
  const tail = { [KEY_RESOURCES]: resources };
  return yaml.dump(head, DUMP_OPTIONS) + yaml.dump(tail, DUMP_OPTIONS);
}
