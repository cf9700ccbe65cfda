import fsPromises from 'fs/promises';
import * as path from 'path';
import { IFileManager } from '../domain/ports';

export class NodeFileSystem implements IFileManager {
    constructor(private readonly baseDir: string) {}

    public async readFile(filePath: string): Promise<string> {
        return await fsPromises.readFile(filePath, { encoding: 'utf-8' });
    }

    public async writeFile(filePath: string, content: string): Promise<void> {
        // Exports land in folders that may not exist yet
        await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
        await fsPromises.writeFile(filePath, content, { encoding: 'utf-8' });
    }

    public joinPathsInProjectFolder(...parts: string[]): string {
        return path.join(this.baseDir, ...parts);
    }

    public async fileExists(filePath: string): Promise<boolean> {
        try {
            await fsPromises.access(filePath);
            return true;
        } catch {
            return false;
        }
    }
}
