import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, JoinColumn, Index } from "typeorm";
import type { ArtifactFamily } from "../wallet/families";
import { UserPersonalization } from "./UserPersonalization";

/**
 * A pass or an order as Wallet knows it. The host application keeps its own
 * domain record and points at this row.
 */
@Entity()
@Index(["family", "typeIdentifier"])
export class Artifact {
    @PrimaryGeneratedColumn("uuid")
    id!: string;

    @Column({ type: "varchar", length: 8 })
    family!: ArtifactFamily;

    @Column()
    typeIdentifier!: string;

    // Set once at creation, embedded in pass.json / order.json.
    @Column()
    authenticationToken!: string;

    @ManyToOne(() => UserPersonalization, { nullable: true, onDelete: "SET NULL" })
    @JoinColumn({ name: "userPersonalizationId" })
    userPersonalization!: UserPersonalization | null;

    @CreateDateColumn()
    createdAt!: Date;

    // Written explicitly by the lifecycle hooks so it keeps millisecond precision.
    @Column()
    updatedAt!: Date;
}
