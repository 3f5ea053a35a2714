export type WaitForOptions = {
  timeout?: number;
  interval?: number;
  errorMessage?: string;
};
