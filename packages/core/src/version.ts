import corePkg from "../package.json";

export const CORE_VERSION: string = corePkg.version;
