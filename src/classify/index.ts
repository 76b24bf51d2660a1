export * from "./linkClassifier";
export * from "./fileName";
export * from "./rules";
