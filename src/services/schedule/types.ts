export type Submission = {
    title: string;
    speakerNames: string; // already joined for display, may be empty
    locale: string;
};

export type RoomRef = {
    name: string;
};

export type Talk = {
    id: string;
    start: Date;
    end: Date;
    duration: number; // minutes
    submission?: Submission;
    description: string; // shown for breaks
    room: RoomRef;
};

export type Room = {
    name: string;
    talks: Talk[];
};

export type DateBucket = {
    start: Date;
    firstStart?: Date;
    lastEnd?: Date;
    rooms: Room[];
};

export type ScheduleEvent = {
    slug: string;
    name: string;
    days: DateBucket[];
};
