import { ArgumentsHost, Catch, Logger } from '@nestjs/common';
import { BaseRpcExceptionFilter } from '@nestjs/microservices';
import { Observable } from 'rxjs';
import { InfrastructureError } from '../errors/cellar.exception';
import { translateStorageError } from '../errors/storage-errors';

@Catch()
export class CellarExceptionFilter extends BaseRpcExceptionFilter<unknown, unknown> {
    private readonly logger = new Logger(CellarExceptionFilter.name);

    catch(exception: unknown, host: ArgumentsHost): Observable<unknown> {
        // reads outside a unit of work are not translated by the context
        const error = translateStorageError(exception);

        if (error instanceof InfrastructureError) {
            const cause = error.cause instanceof Error ? error.cause.stack : undefined;
            this.logger.error(error.message, cause);
        }

        return super.catch(error, host);
    }
}
