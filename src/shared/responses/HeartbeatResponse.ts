export type HeartbeatResponse = {
  databaseReachable: boolean;
  lines: string[];
};
