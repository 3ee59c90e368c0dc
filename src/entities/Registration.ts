import { Entity, PrimaryGeneratedColumn, ManyToOne, JoinColumn, CreateDateColumn, Unique } from "typeorm";
import { Device } from "./Device";
import { Artifact } from "./Artifact";

@Entity()
@Unique(["device", "artifact"])
export class Registration {
    @PrimaryGeneratedColumn("uuid")
    id!: string;

    @ManyToOne(() => Device, { nullable: false, onDelete: "CASCADE" })
    @JoinColumn({ name: "deviceId" })
    device!: Device;

    @ManyToOne(() => Artifact, { nullable: false, onDelete: "CASCADE" })
    @JoinColumn({ name: "artifactId" })
    artifact!: Artifact;

    @CreateDateColumn()
    createdAt!: Date;
}
