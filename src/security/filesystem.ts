import fs from 'fs';
import path from 'path';

function chmodSafe(targetPath: string, mode: number): void {
    if (process.platform === 'win32') {
        return;
    }
    try {
        fs.chmodSync(targetPath, mode);
    } catch (error) {
        // Filesystems without POSIX modes (mounted volumes, some containers) reject chmod.
        const code = (error as NodeJS.ErrnoException).code;
        if (code !== 'EPERM' && code !== 'ENOTSUP' && code !== 'EINVAL') {
            throw error;
        }
    }
}

export function ensureDirectory(directoryPath: string, options: { private?: boolean } = {}): void {
    if (!fs.existsSync(directoryPath)) {
        fs.mkdirSync(directoryPath, { recursive: true });
    }
    if (options.private) {
        chmodSafe(directoryPath, 0o700);
    }
}

export function ensureParentDirectory(filePath: string, options: { private?: boolean } = {}): void {
    ensureDirectory(path.dirname(path.resolve(filePath)), options);
}

export function ensureFilePrivate(filePath: string): void {
    if (!fs.existsSync(filePath)) {
        return;
    }
    chmodSafe(filePath, 0o600);
}
