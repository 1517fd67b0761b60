import { ApiProperty } from '@nestjs/swagger';
import { JOB_STATUSES, JobStatus } from '../interfaces';

/** Reply to a request that started a background job */
export class JobAcceptedDto {
    @ApiProperty()
    jobId!: string;

    @ApiProperty({ enum: [...JOB_STATUSES] })
    status!: JobStatus;

    @ApiProperty()
    totalItems!: number;

    @ApiProperty({ example: 'Poll /jobs/<jobId> for status' })
    message!: string;
}
