export interface IFile {
    fullPath: string;
    readData: () => Promise<Buffer>;
    readText: () => Promise<string>;
    writeData: (data: Buffer) => Promise<void>;
}

export interface IStorageProvider {
    exists: (path: string) => Promise<boolean>;
    isFile: (path: string) => Promise<boolean>;
    isDir: (path: string) => Promise<boolean>;
    readFile: (filePath: string) => Promise<IFile>;
    createFile: (filePath: string, content: Buffer) => Promise<IFile>;
    // Temp file in the target's directory, then rename over the target
    writeFileAtomic: (filePath: string, content: Buffer) => Promise<IFile>;
    moveFile: (filePath: string, targetPath: string) => Promise<IFile>;
    readDir: (dirPath: string, ignore?: string[]) => Promise<string[]>;
    readDirDeep: (dirPath: string, ignore?: string[]) => Promise<string[]>;
    createDir: (dirPath: string) => Promise<string>;
    deleteFileOrDir: (path: string) => Promise<void>;
}

export const describeError = (err: unknown): string =>
    err instanceof Error ? err.message : String(err);
