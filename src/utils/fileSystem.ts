import * as fs from "fs";
import * as path from "path";

export function fileExists(filePath: string): boolean {
  try {
    return fs.existsSync(filePath);
  } catch {
    return false;
  }
}

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

// Cartridge code is 8-bit text; latin1 maps each byte to one char so offsets stay byte offsets.
export async function readTextFileAsync(filePath: string, encoding?: BufferEncoding): Promise<string> {
  return fs.promises.readFile(filePath, encoding || "latin1");
}

export async function writeTextFile(filePath: string, content: string, encoding?: BufferEncoding): Promise<void> {
  ensureDir(path.dirname(path.resolve(filePath)));
  await fs.promises.writeFile(filePath, content, { encoding: encoding || "latin1" });
}

export function isDirectory(p: string): boolean {
  try {
    const stats = fs.statSync(p);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

// Normalizes a path to its canonical form
// (e.g., resolves .. and . segments, uses consistent separators)
export function canonicalizePath(p: string): string {
  return path.normalize(p);
}

// Nearest directory at or above startDir holding a package.json. Works from both src/ and dist/.
export function findPackageRoot(startDir: string = __dirname): string {
  let dir = path.resolve(startDir);
  for (;;) {
    if (fileExists(path.join(dir, "package.json"))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json found above ${startDir}`);
    }
    dir = parent;
  }
}
