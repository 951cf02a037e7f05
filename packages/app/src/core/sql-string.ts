import SqlString from "sqlstring"

// CHANGE: wrap the MySQL string literal escaping primitive
// WHY: JSON strings and object keys are echoed back as single-quoted SQL literals
// QUOTE(TZ): n/a
// REF: req-sql-string-1
// SOURCE: https://github.com/mysqljs/sqlstring
// FORMAT THEOREM: ∀s: encode(s) = "'" + escape(s) + "'"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: \0 \b \t \n \r \x1a " ' \ are backslash-escaped, everything else is verbatim
// COMPLEXITY: O(n)/O(n)

/**
 * Quote and escape `text` as a MySQL string literal, quotes included.
 *
 * @example encodeStringLiteralSql("a'b") === "'a\\'b'"
 *
 * @pure true
 * @complexity O(n)
 */
export const encodeStringLiteralSql = (text: string): string => SqlString.escape(text)
