export { MemoryImage, DEFAULT_WORD_SIZE_BITS } from './image.js';
export type { MemoryImageOptions } from './image.js';
export { writeInfo, formatSize } from './info.js';
export {
  AddDataError,
  AddressRangeError,
  ChecksumError,
  ErrorKinds,
  ImageError,
  ParseError,
  TiTxtError,
  UnsupportedFileFormatError,
  UnsupportedTypeError,
  isImageError,
} from './errors.js';
export type { ErrorKind, TiTxtErrorReason } from './errors.js';
export { Segment, chunkBytes, chunkGeometry } from './memory/segment.js';
export type { Chunk } from './memory/segment.js';
export { SegmentStore } from './memory/segments.js';
export { crcSrec, packSrec, unpackSrec } from './records/srec.js';
export type { SrecRecord, SrecType } from './records/srec.js';
export { IhexTypes, crcIhex, packIhex, unpackIhex } from './records/ihex.js';
export type { IhexRecord } from './records/ihex.js';
export { detectFormat, isIhex, isSrec, isTiTxt, isVerilogVmem } from './formats/detect.js';
export { parseHeaderEncoding } from './formats/header.js';
export type { HeaderEncoding } from './formats/header.js';
export { writeArtifact } from './formats/index.js';
export type {
  Artifact,
  InputFormat,
  OutputFormat,
  WriteArrayOptions,
  WriteBinOptions,
  WriteRecordsOptions,
} from './formats/types.js';
export { isElf, parseElf } from './elf/parseElf.js';
export type { ElfLayout, ElfProgramHeader, ElfSection } from './elf/parseElf.js';
