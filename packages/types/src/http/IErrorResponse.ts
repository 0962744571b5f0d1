/**
 * Body of every failed API response.
 *
 * The HTTP status of the response always equals `error.code`.
 *
 * @example
 * ```json
 * { "error": { "code": 404, "message": "not found" } }
 * ```
 */
export interface IErrorResponse {
    error: {
        code: number;
        message: string;
    };
}
