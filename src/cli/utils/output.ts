/** Where command output goes; stdout by default, an array in tests. */
export type Print = (line: string) => void;

export const printToStdout: Print = (line) => {
  process.stdout.write(`${line}\n`);
};
