import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from "typeorm";

// Fields Wallet collects when a pass asks for personalization (rewards enrollment).
@Entity()
export class UserPersonalization {
    @PrimaryGeneratedColumn("uuid")
    id!: string;

    @Column({ type: "varchar", nullable: true })
    fullName!: string | null;

    @Column({ type: "varchar", nullable: true })
    givenName!: string | null;

    @Column({ type: "varchar", nullable: true })
    familyName!: string | null;

    @Column({ type: "varchar", nullable: true })
    emailAddress!: string | null;

    @Column({ type: "varchar", nullable: true })
    postalCode!: string | null;

    @Column({ type: "varchar", nullable: true })
    isoCountryCode!: string | null;

    @Column({ type: "varchar", nullable: true })
    phoneNumber!: string | null;

    @CreateDateColumn()
    createdAt!: Date;
}
