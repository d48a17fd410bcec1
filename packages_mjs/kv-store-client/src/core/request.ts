/**
 * Request builder helper.
 */
import { HttpMethod, RequestOptions } from '../types.js';

export class RequestBuilder {
    private options: RequestOptions;

    constructor(url: string = '', method: HttpMethod = 'GET') {
        this.options = {
            url,
            method,
            query: {}
        };
    }

    param(key: string, value: string): this {
        this.options.query = { ...this.options.query, [key]: value };
        return this;
    }

    json(data: unknown): this {
        this.options.json = data;
        return this;
    }

    build(): RequestOptions {
        return this.options;
    }
}
