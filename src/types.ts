import * as express from 'express';
import * as core from 'express-serve-static-core';
import jwt from 'jsonwebtoken';

export type DefaultResponseData<Data = unknown> = {
    message: string;
    data?: Data;
};

export type Request<
    A = jwt.JwtPayload | undefined,
    P = core.ParamsDictionary,
    ResBody = DefaultResponseData,
    ReqBody = unknown,
    ReqQuery = core.Query,
    Locals extends Record<string, unknown> = Record<string, unknown>,
> = express.Request<P, ResBody, ReqBody, ReqQuery, Locals> & {
    auth?: A;
};

export type Response<
    ResBody = DefaultResponseData,
    Locals extends Record<string, unknown> = Record<string, unknown>,
> = express.Response<ResBody, Locals>;

export type AccessTokenPayload = {
    userId: string;
    handle: string;
};

export type Pretty<T> = {
    [K in keyof T]: T[K];
} & {};

export type ToDiscoUnion<T, N extends string = 'kind'> = {
    [K in keyof T]: Pretty<
        {
            [P in N]: K;
        } & T[K]
    >;
}[keyof T];

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
