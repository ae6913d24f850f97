export interface LineIndex {
  lineAt(offset: number): number;
}

export function createLineIndex(source: string): LineIndex {
  const lineStarts = [0];
  for (let i = 0; i < source.length; i += 1) {
    if (source[i] === "\n") {
      lineStarts.push(i + 1);
    }
  }

  return {
    lineAt(offset: number): number {
      if (offset <= 0) {
        return 1;
      }
      let low = 0;
      let high = lineStarts.length - 1;
      while (low < high) {
        const mid = Math.ceil((low + high) / 2);
        const start = lineStarts[mid] ?? 0;
        if (start <= offset) {
          low = mid;
        } else {
          high = mid - 1;
        }
      }
      return low + 1;
    },
  };
}
