import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const tempDirs: string[] = [];

/** Creates a temp directory that {@link cleanupTempDirs} removes. */
export function makeTempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'openapi-downgrade-'));
    tempDirs.push(dir);
    return dir;
}

export function cleanupTempDirs(): void {
    while (tempDirs.length > 0) {
        const dir = tempDirs.pop();
        if (dir && fs.existsSync(dir)) {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    }
}

export function writeTempFile(dir: string, name: string, contents: string): string {
    const filePath = path.join(dir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, contents, 'utf-8');
    return filePath;
}
