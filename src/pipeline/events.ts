export type GenerationStage =
  | "init"
  | "script"
  | "thumbnail"
  | "images"
  | "audio"
  | "video";

export type GenerationStatus = "completed" | "error" | "cancelled";

export type PipelineEvent =
  | {
      type: "generation:start";
      title: string;
      timestamp: string;
    }
  | {
      type: "generation:stage";
      stage: GenerationStage;
      step: number;
      totalSteps: number;
      timestamp: string;
    }
  | {
      type: "generation:progress";
      percent: number;
      timestamp: string;
    }
  | {
      type: "generation:operation";
      message: string;
      timestamp: string;
    }
  | {
      type: "generation:finished";
      status: GenerationStatus;
      description: string;
      error?: string;
      stage?: GenerationStage;
      summary: string;
      timestamp: string;
    };

export type BatchItemStatus =
  | "Ready"
  | "Validating"
  | "Processing"
  | "Completed"
  | "Error"
  | "Error (Validation)";

export type BatchEvent =
  | {
      type: "batch:start";
      total: number;
      timestamp: string;
    }
  | {
      type: "item:status";
      index: number;
      total: number;
      status: BatchItemStatus;
      progress: string;
      timestamp: string;
    }
  | {
      type: "item:operation";
      index: number;
      total: number;
      message: string;
      timestamp: string;
    }
  | {
      type: "batch:progress";
      percent: number;
      timestamp: string;
    }
  | {
      type: "batch:done";
      total: number;
      successful: number;
      failed: number;
      report: string;
      timestamp: string;
    }
  | {
      type: "batch:cancelled";
      total: number;
      successful: number;
      failed: number;
      report: string;
      timestamp: string;
    };

export interface PipelineEventEmitter {
  emit(event: PipelineEvent): void;
}

export interface BatchEventEmitter {
  emit(event: BatchEvent): void;
}

export const nowIso = () => new Date().toISOString();
