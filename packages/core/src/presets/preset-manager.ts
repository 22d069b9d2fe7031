import { promises as fs } from "node:fs";
import { extname, join } from "node:path";
import {
  createStylepackError,
  type PresetDefinition,
  presetDefinitionSchema,
} from "@stylepack/types";
import { load } from "js-yaml";
import { STYLEPACK_DIR } from "../config/limits";
import type { Logger } from "../interfaces";
import { BUILTIN_PRESETS } from "./builtin";

const PRESET_EXTENSIONS = new Set([".yaml", ".yml", ".json"]);
const MAX_EXTENDS_DEPTH = 8;

export type PresetSource = "builtin" | "project";

export type AvailablePreset = {
  definition: PresetDefinition;
  source: PresetSource;
  /** File the preset was read from (project presets only). */
  path?: string;
};

/**
 * Resolves presets from the built-in set and from `.stylepack/presets/`.
 * A project preset shadows a built-in preset of the same name.
 */
export class PresetManager {
  private readonly presetsDir: string;
  private readonly logger?: Logger;
  private cache?: Map<string, AvailablePreset>;

  constructor(projectDir: string = process.cwd(), logger?: Logger) {
    this.presetsDir = join(projectDir, STYLEPACK_DIR, "presets");
    this.logger = logger;
  }

  /**
   * List all available presets, sorted by name.
   */
  async listAvailablePresets(): Promise<AvailablePreset[]> {
    const presets = await this.load();
    return Array.from(presets.values()).sort((a, b) =>
      a.definition.name.localeCompare(b.definition.name)
    );
  }

  async getPreset(name: string): Promise<AvailablePreset> {
    const presets = await this.load();
    const preset = presets.get(name);
    if (!preset) {
      throw createStylepackError({
        code: "PRESET_UNKNOWN",
        message: `Unknown preset: ${name}`,
        details: { preset: name, available: Array.from(presets.keys()) },
        help: "Run `stylepack list` to see the available presets.",
      });
    }
    return preset;
  }

  /**
   * Returns the preset and its ancestors, root first.
   */
  async resolveChain(name: string): Promise<PresetDefinition[]> {
    const chain: PresetDefinition[] = [];
    const visited = new Set<string>();
    let current: string | undefined = name;

    while (current !== undefined) {
      if (visited.has(current)) {
        throw createStylepackError({
          code: "PRESET_UNKNOWN",
          message: `Preset "${name}" has a circular extends chain through "${current}"`,
          details: { chain: [...visited, current] },
        });
      }
      if (visited.size >= MAX_EXTENDS_DEPTH) {
        throw createStylepackError({
          code: "PRESET_UNKNOWN",
          message: `Preset "${name}" extends more than ${MAX_EXTENDS_DEPTH} levels deep`,
        });
      }
      visited.add(current);
      const { definition } = await this.getPreset(current);
      chain.unshift(definition);
      current = definition.extends;
    }

    return chain;
  }

  private async load(): Promise<Map<string, AvailablePreset>> {
    if (this.cache) {
      return this.cache;
    }

    const presets = new Map<string, AvailablePreset>();
    for (const definition of BUILTIN_PRESETS.values()) {
      presets.set(definition.name, { definition, source: "builtin" });
    }

    for (const preset of await this.discoverProjectPresets()) {
      if (presets.get(preset.definition.name)?.source === "builtin") {
        this.logger?.debug("Project preset shadows built-in preset", {
          preset: preset.definition.name,
          path: preset.path,
        });
      }
      presets.set(preset.definition.name, preset);
    }

    this.cache = presets;
    return presets;
  }

  private async discoverProjectPresets(): Promise<AvailablePreset[]> {
    const entries = await fs
      .readdir(this.presetsDir, { withFileTypes: true })
      .catch((error: NodeJS.ErrnoException) => {
        if (error.code === "ENOENT") {
          return [];
        }
        throw error;
      });

    const presets: AvailablePreset[] = [];
    for (const entry of entries) {
      const extension = extname(entry.name).toLowerCase();
      if (!(entry.isFile() && PRESET_EXTENSIONS.has(extension))) {
        continue;
      }
      const presetPath = join(this.presetsDir, entry.name);
      presets.push({
        definition: await this.readPresetFile(presetPath, extension),
        source: "project",
        path: presetPath,
      });
    }
    return presets;
  }

  private async readPresetFile(
    presetPath: string,
    extension: string
  ): Promise<PresetDefinition> {
    const contents = await fs.readFile(presetPath, "utf8");
    let raw: unknown;
    try {
      raw = extension === ".json" ? JSON.parse(contents) : load(contents);
    } catch (error) {
      throw createStylepackError({
        code: "PROJECT_CONFIG_INVALID",
        message: `Could not parse preset file ${presetPath}`,
        cause: error,
      });
    }

    const result = presetDefinitionSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "preset"} ${issue.message}`)
        .join("; ");
      throw createStylepackError({
        code: "PROJECT_CONFIG_INVALID",
        message: `Invalid preset ${presetPath}: ${issues}`,
      });
    }
    return result.data;
  }
}
