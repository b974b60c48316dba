import * as connection from './connection'
import * as constants from './constants'
import * as decode from './decode'
import * as encode from './encode'
import * as response from './response'

export { connection, constants, decode, encode, response }

export * from './client'
export * from './config'
export * from './errors'
export * from './serde'
export { ERRORS } from './constants'
