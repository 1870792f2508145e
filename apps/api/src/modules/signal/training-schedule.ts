import type { BotConfig } from "@wfbot/shared";

import { EXTENDED_EPOCHS, EXTENDED_LEARNING_RATE } from "./extended-model";
import type { TrainingSchedule } from "./model.types";

export function trainingSchedule(config: Pick<BotConfig, "modelMode" | "learningRate" | "epochs">): TrainingSchedule {
  if (config.modelMode === "extended") {
    return { learningRate: EXTENDED_LEARNING_RATE, epochs: EXTENDED_EPOCHS };
  }
  return { learningRate: config.learningRate, epochs: config.epochs };
}
