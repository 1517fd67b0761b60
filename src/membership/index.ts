/**
 * @fileoverview Membership Barrel Export
 */

export * from './membership.module';
export * from './membership.service';
export * from './membership.repository';
export * from './interfaces';
export * from './dto';
