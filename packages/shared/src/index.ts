export * from "./numeric";
export * from "./schemas/app-settings";
export * from "./schemas/baseline";
export * from "./schemas/step-manager";
export * from "./schemas/confidence";
export * from "./schemas/order-condition";
export * from "./calendar/krx-holidays";
export * from "./calendar/trading-calendar";
