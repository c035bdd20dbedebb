export interface RuntimeOverrides {
  graphDir?: string;
  inboundSocket?: string;
  outboundSocket?: string;
}

let runtimeOverrides: RuntimeOverrides = {};

export const setRuntimeOverrides = ({ overrides }: { overrides: RuntimeOverrides }): void => {
  runtimeOverrides = overrides;
};

export const getRuntimeOverrides = (): RuntimeOverrides => runtimeOverrides;
