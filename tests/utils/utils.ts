import fs from 'fs';
import os from 'os';
import path from 'path';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function encode(text: string): Uint8Array {
  return encoder.encode(text);
}

function decode(data: Uint8Array): string {
  return decoder.decode(data);
}

async function createTempDir(): Promise<string> {
  return await fs.promises.mkdtemp(path.join(os.tmpdir(), 'unified-vfs-test-'));
}

async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export { encode, decode, createTempDir, removeTempDir };
