export const sweeperVersion = "0.1.0";
