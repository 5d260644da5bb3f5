export type PlaylistExportErrorType =
  'GENERIC' |
  'USAGE' |
  'TOOL_NOT_FOUND' |
  'CREDENTIALS_NOT_FOUND' |
  'INVALID_CREDENTIALS' |
  'UNSUPPORTED_FORMAT' |
  'EMPTY_PLAYLIST';

// problems the user can fix without a code change; the CLI exits with 2 for these
export const RECOVERABLE_ERROR_TYPES: ReadonlyArray<PlaylistExportErrorType> = [
  'USAGE',
  'TOOL_NOT_FOUND',
  'UNSUPPORTED_FORMAT',
  'EMPTY_PLAYLIST',
];

export default class PlaylistExportError extends Error {
  type: PlaylistExportErrorType;
  constructor(type: PlaylistExportErrorType = 'GENERIC', message?: string) {
    super(message ?? type);
    this.name = 'PlaylistExportError';
    this.type = type;
  }

  get isRecoverable() {
    return RECOVERABLE_ERROR_TYPES.includes(this.type);
  }
}
