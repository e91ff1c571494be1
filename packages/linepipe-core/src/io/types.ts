/**
 * I/O seam
 *
 * The core never touches the process, the file system or the clipboard
 * directly. The host supplies a PipeIO; the CLI provides the Node.js one and
 * tests an in-memory one. Implementations may throw plain errors; the core
 * wraps them with the matching error code.
 */

export interface TextWriter {
    write(text: string): Promise<void>;
    close(): Promise<void>;
}

export interface PipeIO {
    /** Lines of standard input, without terminators */
    readStdin(): AsyncIterable<string>;
    /** Lines of a file, without terminators */
    readFileLines(path: string): AsyncIterable<string>;
    readClipboard(): Promise<string>;
    writeClipboard(text: string): Promise<void>;
    /** Open a file for writing, truncating it unless `append` */
    openFile(path: string, append: boolean): Promise<TextWriter>;
    readonly stdout: TextWriter;
}
