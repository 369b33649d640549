export enum ActionType {
    InitGame,
    ShutdownGame,
    ClientConnect,
    ClientUserinfoChanged,
    ClientBegin,
    Item,
    Kill,
    ClientDisconnect,
    Other,
};

export default ActionType;
