import fs from "fs";
import {describeError, IFile} from "./types.js";

export class File implements IFile {
    fullPath: string;

    constructor(fullPath: string) {
        this.fullPath = fullPath;
    }

    async readData(): Promise<Buffer> {
        try {
            return await fs.promises.readFile(this.fullPath);
        } catch (err) {
            throw new Error(`Failed to read file content: ${describeError(err)}`);
        }
    }

    async readText(): Promise<string> {
        return (await this.readData()).toString("utf8");
    }

    async writeData(data: Buffer): Promise<void> {
        try {
            await fs.promises.writeFile(this.fullPath, data);
        } catch (err) {
            throw new Error(`Failed to write file content: ${describeError(err)}`);
        }
    }
}
