import { parseBotConfig } from "@wfbot/shared";
import { describe, expect, it } from "vitest";

import { trainingSchedule } from "./training-schedule";

describe("trainingSchedule", () => {
  it("uses LEARNING_RATE and EPOCHS for the baseline model", () => {
    expect(trainingSchedule(parseBotConfig({}))).toEqual({ learningRate: 0.05, epochs: 4 });
    expect(trainingSchedule(parseBotConfig({ LEARNING_RATE: "0.1", EPOCHS: "9" }))).toEqual({ learningRate: 0.1, epochs: 9 });
  });

  it("keeps the extended model on 6 epochs at 0.05", () => {
    expect(trainingSchedule(parseBotConfig({ MODEL_MODE: "extended" }))).toEqual({ learningRate: 0.05, epochs: 6 });
    expect(trainingSchedule(parseBotConfig({ MODEL_MODE: "extended", LEARNING_RATE: "0.2", EPOCHS: "2" }))).toEqual({
      learningRate: 0.05,
      epochs: 6
    });
  });
});
