export const getWorkspaceRoot = (): string => {
  const envRoot = process.env.FLEETDECK_ROOT;
  if (envRoot && envRoot.trim().length > 0) {
    return envRoot;
  }
  return process.cwd();
};
