import {IStorageProvider} from "./types.js";
import {File} from "./file.js";
import fs from "fs";
import path from "node:path";
import {randomUUID} from "crypto";
import {glob} from "glob";

export class FsStorageProvider implements IStorageProvider {
    async exists(filePath: string): Promise<boolean> {
        try {
            await fs.promises.access(filePath, fs.constants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async isFile(filePath: string): Promise<boolean> {
        const stats = await this.stat(filePath);
        return stats?.isFile() ?? false;
    }

    async isDir(dirPath: string): Promise<boolean> {
        const stats = await this.stat(dirPath);
        return stats?.isDirectory() ?? false;
    }

    async readFile(filePath: string): Promise<File> {
        await fs.promises.access(filePath, fs.constants.R_OK);
        return new File(path.resolve(filePath));
    }

    async createFile(filePath: string, content: Buffer): Promise<File> {
        const resolvedPath = path.resolve(filePath);
        const dir = path.dirname(resolvedPath);

        await fs.promises.mkdir(dir, {recursive: true});
        await fs.promises.writeFile(resolvedPath, content);

        return new File(resolvedPath);
    }

    async writeFileAtomic(filePath: string, content: Buffer): Promise<File> {
        const resolvedPath = path.resolve(filePath);
        const tmpPath = path.join(
            path.dirname(resolvedPath),
            `.${path.basename(resolvedPath)}.${randomUUID()}.tmp`
        );

        await this.createFile(tmpPath, content);
        try {
            return await this.moveFile(tmpPath, resolvedPath);
        } catch (err) {
            await fs.promises.rm(tmpPath, {force: true});
            throw err;
        }
    }

    async moveFile(sourcePath: string, targetPath: string): Promise<File> {
        const from = path.resolve(sourcePath);
        const to = path.resolve(targetPath);
        const targetDir = path.dirname(to);
        await fs.promises.mkdir(targetDir, {recursive: true});
        await fs.promises.rename(from, to);
        return new File(to);
    }

    async readDir(dirPath: string, ignore: string[] = []): Promise<string[]> {
        return await glob.glob("*", {cwd: dirPath, ignore, dot: true, posix: true});
    }

    async readDirDeep(dirPath: string, ignore: string[] = []): Promise<string[]> {
        return await glob.glob("**/*", {cwd: dirPath, ignore, dot: true, posix: true});
    }

    async createDir(dirPath: string): Promise<string> {
        const resolvedPath = path.resolve(dirPath);

        await fs.promises.mkdir(resolvedPath, {recursive: true});

        return resolvedPath;
    }

    async deleteFileOrDir(targetPath: string): Promise<void> {
        await fs.promises.rm(targetPath, {recursive: true});
    }

    private async stat(targetPath: string): Promise<fs.Stats | undefined> {
        try {
            return await fs.promises.stat(targetPath);
        } catch {
            return undefined;
        }
    }
}
