export interface Output {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const consoleOutput: Output = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text)
};
