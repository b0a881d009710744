// version.ts

export const version = "0.1.0";
