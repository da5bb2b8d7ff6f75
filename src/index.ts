/**
 * tagcount - barcode tag demultiplexing and counting for pooled mutant screens
 */

// Compression
export { CompressionDetector, CompressionService, GzipDecompressor, gzipCompress } from "./compression";
// Error types
export {
  BarcodeReferenceError,
  BufferError,
  CompressionError,
  ConfigurationError,
  DSVParseError,
  FileError,
  ParseError,
  SampleNameError,
  StreamError,
  TagCountError,
  ValidationError,
} from "./errors";
// Delimited text
export { CSVParser, CSVWriter, DSVParser, DSVWriter } from "./formats/dsv";
export type { DSVParserOptions, DSVRecord, DSVWriterOptions } from "./formats/dsv";
// FASTQ
export { FastqParser, FastqWriter } from "./formats/fastq";
export type { FastqParserOptions, FastqRecord } from "./formats/fastq";
// File I/O
export { FileReader } from "./io/file-reader";
export { type FileWriteHandle, openForWriting, writeString } from "./io/file-writer";
// Tag counting
export * from "./operations";
export type { CompressionFormat, FileReaderOptions, WriteOptions } from "./types";
