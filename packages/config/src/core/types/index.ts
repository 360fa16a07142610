export * as deserializers from "./deserializers"
export * as types from "./native"
