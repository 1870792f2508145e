export * from "./schemas/bot-config";
export * from "./schemas/bot-state";
export * from "./schemas/candle";
