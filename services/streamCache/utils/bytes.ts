export function concatBytes(chunks: Uint8Array[], totalLength?: number): Uint8Array {
  if (chunks.length === 1) return chunks[0];

  const length = totalLength ?? chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const result = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}
