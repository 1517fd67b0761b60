export * from './member.interface';
export * from './member-page.interface';
