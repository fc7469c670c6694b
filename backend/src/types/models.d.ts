/**========================================================================
 * *                  TYPE DECLARATIONS: DATABASE MODELS
 *========================================================================**/

export type Role = 'user' | 'moderator' | 'admin';

export interface User {
    id: number;
    username: string;
    email: string;
    password_hash: string;
    role: Role;
    banned: boolean;
    created_at: Date;
    updated_at: Date;
}

// user row without credentials, safe to send to the owner
export type UserProfile = Omit<User, 'password_hash'>;

export interface Photo {
    id: number;
    owner_id: number;
    description: string | null;
    url: string;
    public_id: string;
    created_at: Date;
    updated_at: Date;
}

// photo joined with owner, tags and the rating aggregate
export interface PhotoPayload extends Photo {
    owner_username: string;
    tags: string[];
    average_rating: number | null;
    ratings_count: number;
}

export interface Tag {
    id: number;
    name: string;
}

export interface Comment {
    id: number;
    photo_id: number;
    author_id: number;
    body: string;
    edited: boolean;
    created_at: Date;
    updated_at: Date;
}

export interface Rating {
    id: number;
    photo_id: number;
    rater_id: number;
    score: number;
    created_at: Date;
}

export interface RatingSummary {
    average: number | null;
    count: number;
}

export type TransformationSpec =
    | { type: 'circle'; size: number }
    | { type: 'rounded'; radius: number }
    | { type: 'grayscale' }
    | { type: 'sepia' }
    | { type: 'blur'; strength: number };

export type TransformationType = TransformationSpec['type'];

export interface PhotoTransformation {
    id: number;
    photo_id: number;
    url: string;
    params: TransformationSpec;
    qr_code: string;
    created_at: Date;
}
