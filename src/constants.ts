export const imageExtensions = [".jpg", ".jpeg", ".png", ".gif"] as const;

export const organizeModes = ["by-date", "flat"] as const;
