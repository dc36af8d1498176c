import { Key, Namespace } from "./types"

const separator = "::"

export function cacheKey(namespace?: Namespace, key?: Key): string {
    return `${namespace ?? ""}${separator}${key ?? ""}`
}

export function namespacePrefix(namespace?: Namespace): string {
    return cacheKey(namespace, "")
}

// KEYS treats these as glob syntax, a namespace must match literally
const globSpecial = /[*?[\]\\]/g

export function keysPattern(namespace?: Namespace): string {
    return `${namespacePrefix(namespace).replace(globSpecial, "\\$&")}*`
}
