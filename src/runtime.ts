export type RuntimeEnv = {
  log: typeof console.log;
  error: typeof console.error;
  exit: (code: number) => never;
};

export const defaultRuntime: RuntimeEnv = {
  log: (...args: Parameters<typeof console.log>) => {
    console.log(...args);
  },
  error: (...args: Parameters<typeof console.error>) => {
    console.error(...args);
  },
  exit: (code) => process.exit(code),
};
