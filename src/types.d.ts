// Non domain types

export type NotificationPayload = {
    readonly to: string;
    readonly subject: string;
    readonly body: string;
};
