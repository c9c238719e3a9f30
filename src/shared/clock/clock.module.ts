import { Global, Module } from '@nestjs/common';

export const CLOCK = Symbol('CLOCK');

/** Source of "now" for loan dates; replaced with a fixed clock in tests. */
export type Clock = () => Date;

@Global()
@Module({
    providers: [{ provide: CLOCK, useValue: (() => new Date()) satisfies Clock }],
    exports: [CLOCK],
})
export class ClockModule { }
