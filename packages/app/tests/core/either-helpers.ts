import * as Either from "effect/Either"

import { parseFromString } from "../../src/core/parse.js"
import type { Value } from "../../src/core/value.js"

export const right = <A, E>(either: Either.Either<A, E>): A => Either.getOrThrow(either)

export const left = <A, E>(either: Either.Either<A, E>): E => Either.getOrThrow(Either.flip(either))

export const parse = (text: string): Value => right(parseFromString(text))
