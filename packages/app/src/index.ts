export * from "./core/clock.js"
export * from "./core/errors.js"
export * from "./core/json-value.js"
export * from "./core/marshal-sql.js"
export * from "./core/marshal-sql-value.js"
export * from "./core/parse-json.js"
export * from "./core/sql-string.js"
export * from "./core/sql-value.js"
