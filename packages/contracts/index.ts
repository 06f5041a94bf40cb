export * from "./core/time";

export * from "./color/color";

export * from "./grid/grid";

export * from "./audio/audio";

export * from "./input/input";

export * from "./scene/scene";

export * from "./diagnostics/diagnostics";

export * from "./pipeline/interfaces";
