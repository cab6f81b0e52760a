import { load, store } from "./format";
import { componentLogger } from "./logger";
import { objectToRaw } from "./objectFormat";
import { rawToObject, rawToWorking, type ObjectStageContext } from "./rawFormat";
import { emptyRegistry } from "./registry";
import { toJsonMapping } from "./storageFormat";
import type { FormatPipeline, FormatPipelineOptions } from "./types/pipeline";
import { workingToRaw } from "./workingFormat";

/**
 * Binds every stage conversion to one registry.
 */
export const createFormatPipeline = ({
  registry = emptyRegistry,
  logger = componentLogger("format"),
}: FormatPipelineOptions = {}): FormatPipeline => {
  const context: ObjectStageContext = { registry, logger };

  const toObject: FormatPipeline["toObject"] = (value) =>
    rawToObject(value, context);

  const fromObject: FormatPipeline["fromObject"] = (value) =>
    objectToRaw(value, context);

  const pipeline: FormatPipeline = {
    registry,
    load,
    store,
    toRaw: workingToRaw,
    toWorking: rawToWorking,
    toObject,
    fromObject,
    materialize: (document) => toObject(workingToRaw(load(document))),
    dematerialize: (value) => store(rawToWorking(fromObject(value))),
    toJsonMapping,
  };

  return Object.freeze(pipeline);
};
