/**
 * @fileoverview Member listing types
 */

import { Page } from '../../shared/pagination';
import { Member } from './member.interface';

export const SORTABLE_MEMBER_FIELDS = ['name', 'email', 'phoneNumber', 'createdAt', 'updatedAt'] as const;

export type MemberSortField = typeof SORTABLE_MEMBER_FIELDS[number];
export type SortDirection = 'asc' | 'desc';

export interface MemberSort {
    field: MemberSortField;
    direction: SortDirection;
}

export interface MemberListQuery {
    /** Zero-based page index */
    page: number;
    /** Items per page, already capped */
    size: number;
    sort: MemberSort;
    /** Case-insensitive substring over name, email and phone number */
    search?: string;
}

export type MemberPage = Page<Member>;
