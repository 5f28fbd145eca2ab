export { ProcessRunner, type ProcessFinished, type FinishListener } from "./runner";
