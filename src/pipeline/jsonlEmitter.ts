import type { BatchEvent, PipelineEvent } from "./events.js";

export class JsonLinesEventEmitter {
  emit(event: PipelineEvent | BatchEvent): void {
    process.stdout.write(JSON.stringify(event) + "\n");
  }
}
