/**
 * Error handling for barcode tag counting
 *
 * Every failure the tool can raise derives from TagCountError so callers
 * can tell configuration problems, malformed input and I/O failures apart.
 */

/**
 * Base error class for all tagcount errors
 */
export class TagCountError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "TagCountError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or data
 */
export class ValidationError extends TagCountError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends TagCountError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined ? `line ${line}` : "",
      column !== undefined ? `column ${column}` : "",
      field !== undefined ? `field "${field}"` : "",
    ]
      .filter((part) => part !== "")
      .join(", ");

    super(context !== "" ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * Compression/decompression errors
 */
export class CompressionError extends TagCountError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "stream" | "compress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    if (systemError instanceof CompressionError) return systemError;

    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    let suggestion = "";
    if (msg.includes("header") || msg.includes("magic")) {
      suggestion = `. File may be corrupted or not actually ${format} compressed`;
    } else if (msg.includes("unexpected end") || msg.includes("truncated")) {
      suggestion = ". File appears to be truncated or incomplete";
    }

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  override toString(): string {
    let msg = super.toString();
    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }
    return msg;
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends TagCountError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "list",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    if (systemError instanceof FileError) return systemError;

    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enotdir") || msg.includes("not a directory")) {
      return "Path points to a file, not a directory";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }
}

/**
 * Stream processing errors
 */
export class StreamError extends TagCountError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer limits exceeded while splitting a stream into lines
 */
export class BufferError extends TagCountError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

/**
 * A barcode reference row that cannot be trusted
 *
 * Raised for rows without a gene id, rows without a barcode (unless missing
 * barcodes are tolerated) and barcodes outside the allowed length range.
 */
export class BarcodeReferenceError extends ValidationError {
  constructor(
    message: string,
    public readonly row?: number,
    public readonly barcode?: string
  ) {
    super(message, row, barcode !== undefined ? `barcode: ${barcode}` : undefined);
    this.name = "BarcodeReferenceError";
  }
}

/**
 * Missing or unusable run configuration
 */
export class ConfigurationError extends TagCountError {
  constructor(
    message: string,
    public readonly setting: string
  ) {
    super(message, "CONFIGURATION_ERROR", undefined, `setting: ${setting}`);
    this.name = "ConfigurationError";
  }
}

/**
 * A read collection whose file name carries no sample token, or whose
 * sample is already taken by another collection
 */
export class SampleNameError extends TagCountError {
  constructor(
    public readonly fileName: string,
    message?: string
  ) {
    super(
      message ?? `could not parse sample name from fastq file name '${fileName}'`,
      "SAMPLE_NAME_ERROR",
      undefined,
      message === undefined
        ? "Sample names must end in digits directly before the .fastq extension, e.g. lib12.fastq"
        : undefined
    );
    this.name = "SampleNameError";
  }
}
