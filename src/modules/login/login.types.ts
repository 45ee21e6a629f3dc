import { ToDiscoUnion } from '@app/types';

export interface LoginRequestType {
    phone: string;
    pin: string;
}

export interface LoginSuccess {
    token: string;
    handle: string;
}

type LoginFailureMap = {
    UnknownUser: {};
    NoPinSet: {};
    WrongFormat: {};
    WrongPin: { attemptsLeft: number; lockedUntil?: Date };
    Locked: { until: Date };
};

export type LoginFailure = ToDiscoUnion<LoginFailureMap>;
