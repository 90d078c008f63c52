import readline from 'node:readline';

export const prompt = async (question: string, defaultValue?: string): Promise<string> => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((res) => {
    rl.question(question, (answer) => {
      rl.close();
      if (!answer && defaultValue) return res(defaultValue);
      res(answer);
    });
  });
};

export const formatDuration = (startedAt: number, now = Date.now()): string => {
  const elapsedMs = now - startedAt;
  const seconds = elapsedMs / 1000;
  return seconds >= 0.1 ? seconds.toFixed(1) + 's' : elapsedMs + 'ms';
};
