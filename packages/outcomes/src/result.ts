import {classifyFailure, type ClassifiedOutcome} from './classify';

export type OperationSuccess<T> = {ok: true; value: T};
export type OperationFailure = {ok: false; outcome: ClassifiedOutcome};
export type OperationResult<T> = OperationSuccess<T> | OperationFailure;

export const succeeded = <T>(value: T): OperationSuccess<T> => ({ok: true, value});

export const failed = (outcome: ClassifiedOutcome): OperationFailure => ({ok: false, outcome});

export const failWith = (signal: unknown): OperationFailure => failed(classifyFailure(signal));
