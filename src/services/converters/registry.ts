/**
 * Converter registry: the first registered converter whose `supports`
 * accepts a file handles it.
 */

import type { PipelineConfig } from "../../config.js";
import type { ConverterId, ConvertibleFile } from "../../types/conversion.js";
import type { Converter } from "./types.js";

export class ConverterRegistry {
  private converters: Converter[] = [];

  register(converter: Converter): this {
    if (this.converters.some((c) => c.id === converter.id)) {
      throw new Error(`Converter "${converter.id}" is already registered`);
    }
    this.converters.push(converter);
    return this;
  }

  select(file: ConvertibleFile, config: PipelineConfig): Converter | null {
    return this.converters.find((c) => c.supports(file, config)) ?? null;
  }

  get(id: ConverterId): Converter | null {
    return this.converters.find((c) => c.id === id) ?? null;
  }

  list(): readonly Converter[] {
    return this.converters;
  }
}
