export const EMPTY_BUFFER = Buffer.alloc(0)

/** Protocol lines and values are delimited by `\r\n` */
export const TERMINATOR = Buffer.from('\r\n', 'latin1')

export enum BUFFERS {
  RECV_SIZE = 4096, // bytes requested from the socket on each read
  KEY_SIZE = 250, // max key length in bytes
  EXCERPT_SIZE = 32, // chars of an unparseable line kept for diagnostics
}

export enum FLAGS {
  // zero is what "incr" and "decr" create, and what foreign clients
  // usually write: read it back as a plain buffer
  RAW = 0x0000,
  // strings in JSON are escaped and quoted, so we keep them plain
  STRING = 0x0001,
  // objects/arrays go the JSON way
  JSON = 0x0002,
  // primitives
  BIGINT = 0x0003,
  NUMBER = 0x0004,
  BOOLEAN = 0x0005,
  NULL = 0x0006,
  // typed arrays
  UINT8ARRAY = 0x2001,
  UINT8CLAMPEDARRAY = 0x2002,
  UINT16ARRAY = 0x2003,
  UINT32ARRAY = 0x2004,
  INT8ARRAY = 0x2005,
  INT16ARRAY = 0x2006,
  INT32ARRAY = 0x2007,
  BIGUINT64ARRAY = 0x2008,
  BIGINT64ARRAY = 0x2009,
  FLOAT32ARRAY = 0x200A,
  FLOAT64ARRAY = 0x200B,
}

export enum ERRORS {
  UNKNOWN_COMMAND = 'unknown-command', // server did not recognize the request
  CLIENT_ERROR = 'client-error', // request rejected, locally or by the server
  SERVER_ERROR = 'server-error', // server failed processing the request
  UNKNOWN_RESPONSE = 'unknown-response', // reply does not match the command
  UNEXPECTED_CLOSE = 'unexpected-close', // stream ended mid-response
  TRANSPORT = 'transport', // socket errors and timeouts
}

/** Valid reply lines for each command of the store family */
export const STORE_RESULTS = {
  set: [ 'STORED' ],
  add: [ 'STORED', 'NOT_STORED' ],
  replace: [ 'STORED', 'NOT_STORED' ],
  append: [ 'STORED', 'NOT_STORED' ],
  prepend: [ 'STORED', 'NOT_STORED' ],
  cas: [ 'STORED', 'EXISTS', 'NOT_FOUND' ],
} as const

/** Names of the commands in the store family */
export type StoreName = keyof typeof STORE_RESULTS

/** The reply tokens a store command `N` can legitimately produce */
export type StoreResult<N extends StoreName> = (typeof STORE_RESULTS)[N][number]

export const NOT_FOUND = 'NOT_FOUND'
export const END = 'END'
