import type {
  ImagesetGrouping,
  ImagesetGroupingService,
} from "./ImagesetGroupingService";
import { formatTemplate } from "./Template";
import type { TemplateInferencer } from "./TemplateInferencer";
import { TemplateInferencerDefault } from "./TemplateInferencerDefault";

export class ImagesetGroupingServiceDefault implements ImagesetGroupingService {
  private readonly inferencer: TemplateInferencer;

  constructor(deps?: { inferencer?: TemplateInferencer }) {
    this.inferencer = deps?.inferencer ?? new TemplateInferencerDefault();
  }

  group(fileNames: readonly string[]): ImagesetGrouping {
    const grouping: ImagesetGrouping = new Map();

    for (const fileName of fileNames) {
      const { template, index } = this.inferencer.infer(fileName);
      const key = template ? formatTemplate(template) : fileName;
      const value = template ? index : null;

      const indices = grouping.get(key);
      if (indices) {
        indices.push(value);
      } else {
        grouping.set(key, [value]);
      }
    }

    return grouping;
  }
}
