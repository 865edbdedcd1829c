import { Global, Module } from '@nestjs/common';
import { TracingService } from './tracing.service';
import { OtelInvocationObserver } from './invocation-observer';

@Global()
@Module({
    providers: [TracingService, OtelInvocationObserver],
    exports: [TracingService, OtelInvocationObserver],
})
export class TracingModule { }
