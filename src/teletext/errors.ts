export type TeletextErrorKind =
  | 'UnmappedCharacter'
  | 'MalformedPayload'
  | 'InvalidLinkTarget'
  | 'IncompletePage'
  | 'RecordFormatError'
  | 'CharsetTableError'
  | 'FontMapError'
  | 'UnknownStation';

export class TeletextError extends Error {
  constructor(public readonly kind: TeletextErrorKind, message: string) {
    super(message);
    this.name = kind;
  }
}

export class UnmappedCharacterError extends TeletextError {
  constructor(public readonly charset: string, public readonly code: number) {
    super('UnmappedCharacter', `No mapping for code 0x${code.toString(16)} in charset ${charset}`);
  }
}

export class MalformedPayloadError extends TeletextError {
  constructor(message: string) {
    super('MalformedPayload', message);
  }
}

export class InvalidLinkTargetError extends TeletextError {
  constructor(public readonly target: string) {
    super('InvalidLinkTarget', `Invalid link target '${target}'`);
  }
}

export class IncompletePageError extends TeletextError {
  constructor(public readonly page: number, public readonly subPage: number) {
    super('IncompletePage', `Page ${page}/${subPage} has no rows`);
  }
}

export class RecordFormatError extends TeletextError {
  constructor(message: string) {
    super('RecordFormatError', message);
  }
}

export class CharsetTableError extends TeletextError {
  constructor(message: string) {
    super('CharsetTableError', message);
  }
}

export class FontMapError extends TeletextError {
  constructor(message: string) {
    super('FontMapError', message);
  }
}

export class UnknownStationError extends TeletextError {
  constructor(public readonly stationId: string) {
    super('UnknownStation', `Unknown station '${stationId}'`);
  }
}

export function isTeletextError(error: unknown, kind?: TeletextErrorKind): error is TeletextError {
  return error instanceof TeletextError && (kind === undefined || error.kind === kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
