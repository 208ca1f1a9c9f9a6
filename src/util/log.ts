export type LogSink = (line: string) => void;

export const consoleSink: LogSink = (line) => console.error(line);

export const silentSink: LogSink = () => {};
